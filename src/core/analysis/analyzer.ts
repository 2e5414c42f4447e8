/**
 * Decision analyzer contract and the rules every variant shares
 * @module core/analysis/analyzer
 */

import type { Candidate } from '../../types/candidate'
import type {
  ClassifiedCandidates,
  MatchAction,
  MatchAnalysis,
  MatchDecision,
} from '../../types/match'
import type { BibRecord } from '../../types/record'
import { getInputCallNumber, getResourceId } from '../matching/match-identifiers.js'

/**
 * Analyzer variants, one per workflow and library/collection branch
 */
export type AnalyzerKey =
  | 'nypl-branch'
  | 'nypl-research'
  | 'bpl-cataloging'
  | 'selection'
  | 'acquisitions'

/**
 * Chooses a single decision for a record from its classified candidates.
 */
export interface DecisionAnalyzer {
  readonly key: AnalyzerKey
  analyze(record: BibRecord, classified: ClassifiedCandidates): MatchAnalysis
}

/**
 * Recency rule. In-house catalog records are attached to as they are. A vendor
 * record is overlaid when the incoming record has no update date or the
 * candidate was updated after it; otherwise it is attached to.
 */
export function determineCatalogAction(
  record: Pick<BibRecord, 'updateDate'>,
  candidate: Pick<Candidate, 'catSource' | 'updateDate'>,
): { action: MatchAction; updatedByVendor: boolean } {
  if (candidate.catSource === 'inhouse') {
    return { action: 'attach', updatedByVendor: false }
  }
  if (
    !record.updateDate ||
    (candidate.updateDate !== null && candidate.updateDate.getTime() > record.updateDate.getTime())
  ) {
    return { action: 'overlay', updatedByVendor: true }
  }
  return { action: 'attach', updatedByVendor: false }
}

/**
 * Decision for a chosen candidate under the recency rule
 */
export function decideAgainst(record: BibRecord, candidate: Candidate): MatchDecision {
  const { action, updatedByVendor } = determineCatalogAction(record, candidate)
  return { action, targetId: candidate.bibId, updatedByVendor }
}

export interface AnalysisOutcome {
  decision: MatchDecision
  callNumberMatch: boolean
  targetCallNumber?: string | null
  targetTitle?: string | null
}

/**
 * Assembles the analysis reported for a record
 */
export function buildAnalysis(
  record: BibRecord,
  classified: ClassifiedCandidates,
  outcome: AnalysisOutcome,
): MatchAnalysis {
  return {
    decision: outcome.decision,
    callNumberMatch: outcome.callNumberMatch,
    inputCallNumber: getInputCallNumber(record),
    targetCallNumber: outcome.targetCallNumber ?? null,
    targetTitle: outcome.targetTitle ?? null,
    resourceId: getResourceId(record),
    vendor: record.vendor,
    library: record.library,
    collection: record.collection,
    workflow: record.workflow,
    duplicates: classified.duplicates,
    mixed: classified.mixed,
    other: classified.other,
  }
}

/**
 * Last matched candidate: the highest catalog id
 */
export function fallbackCandidate(classified: ClassifiedCandidates): Candidate | undefined {
  return classified.matched[classified.matched.length - 1]
}

/**
 * Branch call number agreement: the record's call number list must be
 * exactly the candidate's single call number. A record carrying two call
 * numbers never agrees.
 */
export function sameBranchCallNumber(record: BibRecord, candidate: Candidate): boolean {
  const callNumbers = record.branchCallNumber
  return (
    candidate.branchCallNumber !== null &&
    callNumbers.length === 1 &&
    callNumbers[0] === candidate.branchCallNumber
  )
}
