import type { Candidate } from './candidate'
import type { Collection, LibrarySystem, Workflow } from './record'

/**
 * Outcome of the decision engine.
 * - `'insert'`: new catalog entry
 * - `'attach'`: link items and orders to an existing entry, unchanged
 * - `'overlay'`: replace an existing entry's descriptive data
 */
export type MatchAction = 'insert' | 'attach' | 'overlay'

export interface MatchDecision {
  readonly action: MatchAction
  /** Catalog id the record will load against, `null` for a new entry */
  readonly targetId: string | null
  /** Whether the target was a vendor record older than the incoming one */
  readonly updatedByVendor: boolean
}

/**
 * Candidates partitioned against the incoming record.
 */
export interface ClassifiedCandidates {
  /** Same collection as the record, ascending by numeric catalog id */
  readonly matched: readonly Candidate[]
  /** Ids of multi-collection candidates */
  readonly mixed: readonly string[]
  /** Ids of candidates in a different collection */
  readonly other: readonly string[]
  /** Ids of `matched` when more than one candidate matched, else empty */
  readonly duplicates: readonly string[]
}

/**
 * Decision plus the fields the reports need.
 */
export interface MatchAnalysis {
  readonly decision: MatchDecision
  readonly callNumberMatch: boolean
  readonly inputCallNumber: string | null
  readonly targetCallNumber: string | null
  readonly targetTitle: string | null
  readonly resourceId: string | null
  readonly vendor: string | null
  readonly library: LibrarySystem
  readonly collection: Collection
  readonly workflow: Workflow
  readonly duplicates: readonly string[]
  readonly mixed: readonly string[]
  readonly other: readonly string[]
}
