/**
 * Merges new records of a batch that describe the same work
 * @module dedupe/batch-deduplicator
 */

import type { EngineConfig } from '../types/config'
import type { MarcRecord } from '../types/marc'
import type { MatchDecision } from '../types/match'
import type { BibRecord } from '../types/record'
import { getBarcodes, getItemFields, itemFieldPatternFor } from '../marc/item-fields.js'
import { insertOrdered } from '../marc/marc-record.js'
import type { Logger } from '../services/logger.js'
import { createSilentLogger } from '../services/logger.js'
import { InvalidParameterError } from '../utils/errors.js'

/**
 * Records split by decision. `new` holds the unmerged new records for
 * reporting; `deduped` holds what is written.
 */
export interface DedupeResult {
  attach: BibRecord[]
  new: BibRecord[]
  deduped: BibRecord[]
}

export interface DedupeOptions {
  config: Pick<EngineConfig, 'libraries'>
  logger?: Logger
}

function groupByControlNumber(records: readonly BibRecord[]): Map<string, BibRecord[]> {
  const groups = new Map<string, BibRecord[]>()
  for (const record of records) {
    if (!record.controlNumber) continue
    const group = groups.get(record.controlNumber)
    if (group) {
      group.push(record)
    } else {
      groups.set(record.controlNumber, [record])
    }
  }
  return groups
}

function mergeGroup(group: readonly BibRecord[], config: Pick<EngineConfig, 'libraries'>): BibRecord {
  const [base, ...others] = group
  const pattern = itemFieldPatternFor(base.marc, config.libraries[base.library])
  let fields = [...base.marc.fields]
  for (const other of others) {
    for (const item of getItemFields(other.marc, pattern)) {
      fields = insertOrdered(fields, item)
    }
  }
  const marc: MarcRecord = { leader: base.marc.leader, fields }
  return { ...base, marc, barcodes: getBarcodes(marc, pattern) }
}

/**
 * Splits records into attach and new, then merges new records sharing a
 * control number: the first record of each group receives the item fields
 * of the others. Only fields matching the first record's item pattern are
 * taken; items in another pattern are left behind and surface in barcode
 * validation. Records without a control number, and unique ones, pass
 * through unchanged. Inputs are never mutated.
 *
 * @throws {InvalidParameterError} If records and decisions differ in length
 *
 * @example
 * ```typescript
 * const { attach, deduped } = dedupeBatch(records, decisions, { config })
 * ```
 */
export function dedupeBatch(
  records: readonly BibRecord[],
  decisions: readonly MatchDecision[],
  options: DedupeOptions,
): DedupeResult {
  if (records.length !== decisions.length) {
    throw new InvalidParameterError(
      'decisions',
      decisions.length,
      `expected one decision per record (${records.length})`,
    )
  }
  const logger = options.logger ?? createSilentLogger()

  const attach = records.filter((_, index) => decisions[index].action === 'attach')
  const fresh = records.filter((_, index) => decisions[index].action !== 'attach')
  if (fresh.length === 0) {
    return { attach, new: [], deduped: [] }
  }

  const groups = groupByControlNumber(fresh)
  const merged = new Set<string>()
  const deduped: BibRecord[] = []

  for (const record of fresh) {
    const group = record.controlNumber ? groups.get(record.controlNumber) : undefined
    if (!record.controlNumber || !group || group.length === 1) {
      deduped.push(record)
      continue
    }
    if (merged.has(record.controlNumber)) continue
    merged.add(record.controlNumber)
    deduped.push(mergeGroup(group, options.config))
    logger.info(`Merged ${group.length} records sharing control number ${record.controlNumber}`)
  }

  return { attach, new: fresh, deduped }
}
