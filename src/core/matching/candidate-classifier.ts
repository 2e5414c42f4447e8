/**
 * Partitions search hits against the incoming record
 * @module core/matching/candidate-classifier
 */

import type { Candidate } from '../../types/candidate'
import type { ClassifiedCandidates } from '../../types/match'
import type { BibRecord } from '../../types/record'
import { bibIdNumber } from '../normalizers/identifier.js'

function compareBibIds(left: Candidate, right: Candidate): number {
  const a = bibIdNumber(left.bibId)
  const b = bibIdNumber(right.bibId)
  if (a === b) return 0
  return a < b ? -1 : 1
}

/**
 * Sorts candidates by numeric catalog id, then partitions them:
 *
 * - every candidate of a library without collections is `matched`
 * - a `MIXED` candidate goes to `mixed`
 * - a candidate in the record's collection is `matched`, any other is `other`
 *
 * `duplicates` lists the matched ids when more than one candidate matched.
 * Mixed and other candidates never count as duplicates.
 *
 * @example
 * ```typescript
 * const classified = classifyCandidates(record, candidates)
 * const fallback = classified.matched.at(-1) // highest catalog id
 * ```
 */
export function classifyCandidates(
  record: Pick<BibRecord, 'library' | 'collection'>,
  candidates: readonly Candidate[],
): ClassifiedCandidates {
  const matched: Candidate[] = []
  const mixed: string[] = []
  const other: string[] = []

  for (const candidate of [...candidates].sort(compareBibIds)) {
    if (record.library === 'bpl') {
      matched.push(candidate)
    } else if (candidate.collection === 'MIXED') {
      mixed.push(candidate.bibId)
    } else if (candidate.collection === record.collection) {
      matched.push(candidate)
    } else {
      other.push(candidate.bibId)
    }
  }

  return {
    matched,
    mixed,
    other,
    duplicates: matched.length > 1 ? matched.map((candidate) => candidate.bibId) : [],
  }
}
