import type { ClassifiedCandidates, MatchAnalysis } from '../../../types/match'
import type { BibRecord } from '../../../types/record'
import type { DecisionAnalyzer } from '../analyzer.js'
import { buildAnalysis } from '../analyzer.js'

/**
 * Acquisitions records are always inserted under their own bib id, whatever matched.
 */
export class AcquisitionsAnalyzer implements DecisionAnalyzer {
  readonly key = 'acquisitions'

  analyze(record: BibRecord, classified: ClassifiedCandidates): MatchAnalysis {
    return buildAnalysis(record, classified, {
      decision: { action: 'insert', targetId: record.bibId, updatedByVendor: false },
      callNumberMatch: true,
      targetCallNumber: record.branchCallNumber[0] ?? null,
      targetTitle: record.title,
    })
  }
}
