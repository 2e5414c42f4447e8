import type { ClassifiedCandidates, MatchAnalysis } from '../../../types/match'
import type { BibRecord } from '../../../types/record'
import type { DecisionAnalyzer } from '../analyzer.js'
import { buildAnalysis, fallbackCandidate } from '../analyzer.js'

/**
 * Selection records attach to the first match holding any call number, or to
 * the highest-id match. Call numbers always count as matching.
 */
export class SelectionAnalyzer implements DecisionAnalyzer {
  readonly key = 'selection'

  analyze(record: BibRecord, classified: ClassifiedCandidates): MatchAnalysis {
    const fallback = fallbackCandidate(classified)
    if (!fallback) {
      return buildAnalysis(record, classified, {
        decision: { action: 'insert', targetId: null, updatedByVendor: false },
        callNumberMatch: true,
      })
    }

    const target =
      classified.matched.find(
        (candidate) => !!candidate.branchCallNumber || candidate.researchCallNumber.length > 0,
      ) ?? fallback

    return buildAnalysis(record, classified, {
      decision: { action: 'attach', targetId: target.bibId, updatedByVendor: false },
      callNumberMatch: true,
      targetCallNumber: target.branchCallNumber,
      targetTitle: target.title,
    })
  }
}
