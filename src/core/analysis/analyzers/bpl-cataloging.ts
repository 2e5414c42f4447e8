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
 * BPL cataloging records. Call numbers are compared as for NYPL branches.
 * When nothing matched, records from the vendors in `attachOnNoMatchVendors`
 * are attached rather than inserted.
 */
export class BplCatalogingAnalyzer implements DecisionAnalyzer {
  readonly key = 'bpl-cataloging'

  constructor(private readonly attachOnNoMatchVendors: readonly string[]) {}

  analyze(record: BibRecord, classified: ClassifiedCandidates): MatchAnalysis {
    const fallback = fallbackCandidate(classified)
    if (!fallback) {
      const attach = record.vendor !== null && this.attachOnNoMatchVendors.includes(record.vendor)
      return buildAnalysis(record, classified, {
        decision: {
          action: attach ? 'attach' : 'insert',
          targetId: record.bibId,
          updatedByVendor: false,
        },
        callNumberMatch: true,
        targetCallNumber: record.branchCallNumber[0] ?? null,
        targetTitle: record.title,
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
