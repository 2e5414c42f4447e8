/**
 * Item barcode checks before and after a batch is processed
 * @module dedupe/barcode-validator
 */

import type { EngineConfig } from '../types/config'
import type { BibRecord } from '../types/record'
import { getBarcodes, itemFieldPatternFor } from '../marc/item-fields.js'
import type { Logger } from '../services/logger.js'
import { createSilentLogger } from '../services/logger.js'
import { DuplicateBarcodeError } from '../utils/errors.js'

export interface BarcodeValidation {
  valid: boolean
  /** Original barcodes absent from the output, once per missing copy */
  missing: string[]
  /** Output barcodes that were not in the original batch */
  unexpected: string[]
}

function countBarcodes(barcodes: readonly string[]): Map<string, number> {
  const counts = new Map<string, number>()
  for (const barcode of barcodes) {
    counts.set(barcode, (counts.get(barcode) ?? 0) + 1)
  }
  return counts
}

function shortfall(expected: Map<string, number>, actual: Map<string, number>): string[] {
  const result: string[] = []
  for (const [barcode, count] of expected) {
    const lacking = count - (actual.get(barcode) ?? 0)
    for (let i = 0; i < lacking; i++) {
      result.push(barcode)
    }
  }
  return result
}

/**
 * Rejects a batch whose records share item barcodes.
 *
 * @throws {DuplicateBarcodeError} Listing each repeated barcode once
 */
export function ensureUniqueBarcodes(records: readonly BibRecord[]): void {
  const counts = countBarcodes(records.flatMap((record) => record.barcodes))
  const repeated = [...counts].filter(([, count]) => count > 1).map(([barcode]) => barcode)
  if (repeated.length > 0) {
    throw new DuplicateBarcodeError(repeated)
  }
}

/**
 * Compares, as multisets, the item barcodes of the output batches with the
 * barcodes captured before processing. A mismatch is logged and reported,
 * never thrown.
 */
export function validateBarcodes(
  batches: readonly (readonly BibRecord[])[],
  originalBarcodes: readonly string[],
  config: Pick<EngineConfig, 'libraries'>,
  logger: Logger = createSilentLogger(),
): BarcodeValidation {
  const output = batches.flatMap((batch) =>
    batch.flatMap((record) =>
      getBarcodes(record.marc, itemFieldPatternFor(record.marc, config.libraries[record.library])),
    ),
  )
  const expected = countBarcodes(originalBarcodes)
  const actual = countBarcodes(output)

  const missing = shortfall(expected, actual)
  const unexpected = shortfall(actual, expected)
  const valid = missing.length === 0 && unexpected.length === 0

  if (!valid) {
    logger.error('Barcodes in output do not match the original batch', { missing, unexpected })
  }
  return { valid, missing, unexpected }
}
