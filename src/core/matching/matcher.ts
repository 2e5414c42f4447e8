/**
 * Queries a candidate source by priority-ordered matchpoints
 * @module core/matching/matcher
 */

import type { Candidate } from '../../types/candidate'
import type { BibRecord, Matchpoints } from '../../types/record'
import { MATCHPOINT_ORDER } from '../../types/record'
import type { CandidateSource } from '../../services/sources/candidate-source.js'
import type { Logger } from '../../services/logger.js'
import { createSilentLogger } from '../../services/logger.js'
import { withTimeout } from '../../services/resilience/timeout.js'
import {
  MatchpointsMissingError,
  VendorInfoMissingError,
  requireNonNull,
  requirePositive,
} from '../../utils/errors.js'
import { IDENTIFIER_NORMALIZERS } from '../normalizers/identifier.js'
import { getIdentifierValue, getResourceId } from './match-identifiers.js'

export interface BibMatcherOptions {
  source: CandidateSource
  /** Per-lookup timeout in milliseconds */
  timeoutMs: number
  logger?: Logger
}

function hasMatchpoints(matchpoints: Matchpoints | null | undefined): matchpoints is Matchpoints {
  return !!matchpoints && MATCHPOINT_ORDER.some((priority) => matchpoints[priority] !== undefined)
}

/**
 * Picks the matchpoints for a record: cataloging records use their vendor's,
 * acquisitions and selection records use the batch's.
 *
 * @throws {VendorInfoMissingError} For a cataloging record without vendor information
 * @throws {MatchpointsMissingError} For an acquisitions or selection record without batch matchpoints
 */
export function resolveMatchpoints(
  record: BibRecord,
  batchMatchpoints?: Matchpoints | null,
): Matchpoints {
  if (record.workflow === 'cat') {
    if (!record.vendorInfo) {
      throw new VendorInfoMissingError(getResourceId(record))
    }
    return record.vendorInfo.matchpoints
  }
  if (!hasMatchpoints(batchMatchpoints)) {
    throw new MatchpointsMissingError(record.workflow)
  }
  return batchMatchpoints
}

/**
 * BibMatcher finds catalog candidates for a record.
 *
 * Matchpoints are tried in priority order. A matchpoint whose value is absent
 * on the record is skipped; the first lookup returning candidates ends the
 * search. Lookups that fail or time out propagate: a failed lookup is never
 * reported as "no candidates".
 */
export class BibMatcher {
  private readonly source: CandidateSource
  private readonly timeoutMs: number
  private readonly logger: Logger

  constructor(options: BibMatcherOptions) {
    this.source = requireNonNull(options.source, 'source')
    this.timeoutMs = requirePositive(options.timeoutMs, 'timeoutMs')
    this.logger = options.logger ?? createSilentLogger()
  }

  async match(
    record: BibRecord,
    matchpoints: Matchpoints,
    signal?: AbortSignal,
  ): Promise<Candidate[]> {
    for (const priority of MATCHPOINT_ORDER) {
      const kind = matchpoints[priority]
      if (!kind) continue

      const value = IDENTIFIER_NORMALIZERS[kind](getIdentifierValue(record, kind))
      if (!value) {
        this.logger.debug(`Skipping ${priority} matchpoint '${kind}' with no value`, {
          resourceId: getResourceId(record),
        })
        continue
      }

      const candidates = await withTimeout(this.source.getCandidates(kind, value), {
        timeoutMs: this.timeoutMs,
        sourceName: this.source.name,
        signal,
      })
      this.logger.debug(`Matchpoint '${kind}' returned ${candidates.length} candidates`, {
        value,
      })
      if (candidates.length > 0) {
        return candidates
      }
    }
    return []
  }
}
