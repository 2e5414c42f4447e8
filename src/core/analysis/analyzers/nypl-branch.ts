import type { ClassifiedCandidates, MatchAnalysis } from '../../../types/match'
import type { BibRecord } from '../../../types/record'
import type { DecisionAnalyzer } from '../analyzer.js'
import {
  buildAnalysis,
  decideAgainst,
  fallbackCandidate,
  sameBranchCallNumber,
} from '../analyzer.js'

/**
 * NYPL Branch Libraries cataloging records.
 *
 * The first matched candidate whose branch call number equals the record's
 * is chosen; without one the highest-id match is used and the call numbers
 * are reported as not matching.
 */
export class NyplBranchAnalyzer implements DecisionAnalyzer {
  readonly key = 'nypl-branch'

  analyze(record: BibRecord, classified: ClassifiedCandidates): MatchAnalysis {
    const fallback = fallbackCandidate(classified)
    if (!fallback) {
      return buildAnalysis(record, classified, {
        decision: { action: 'insert', targetId: null, updatedByVendor: false },
        callNumberMatch: true,
      })
    }

    const agreeing = classified.matched.find((candidate) =>
      sameBranchCallNumber(record, candidate),
    )
    const target = agreeing ?? fallback

    return buildAnalysis(record, classified, {
      decision: decideAgainst(record, target),
      callNumberMatch: agreeing !== undefined,
      targetCallNumber: target.branchCallNumber,
      targetTitle: target.title,
    })
  }
}
