import type { ClassifiedCandidates, MatchAnalysis } from '../../../types/match'
import type { BibRecord } from '../../../types/record'
import type { DecisionAnalyzer } from '../analyzer.js'
import { buildAnalysis, decideAgainst, fallbackCandidate } from '../analyzer.js'

/**
 * NYPL Research Libraries cataloging records.
 *
 * Any matched candidate carrying a research call number is accepted, the first
 * one wins; research call numbers are not compared with the record's. Without
 * one, the highest-id match is used under the same recency rule.
 */
export class NyplResearchAnalyzer implements DecisionAnalyzer {
  readonly key = 'nypl-research'

  analyze(record: BibRecord, classified: ClassifiedCandidates): MatchAnalysis {
    const fallback = fallbackCandidate(classified)
    if (!fallback) {
      return buildAnalysis(record, classified, {
        decision: { action: 'insert', targetId: null, updatedByVendor: false },
        callNumberMatch: true,
      })
    }

    const withCallNumber = classified.matched.find(
      (candidate) => candidate.researchCallNumber.length > 0,
    )
    if (withCallNumber) {
      return buildAnalysis(record, classified, {
        decision: decideAgainst(record, withCallNumber),
        callNumberMatch: true,
        targetCallNumber: withCallNumber.researchCallNumber[0],
        targetTitle: withCallNumber.title,
      })
    }

    return buildAnalysis(record, classified, {
      decision: decideAgainst(record, fallback),
      callNumberMatch: false,
      targetCallNumber: null,
      targetTitle: fallback.title,
    })
  }
}
