/**
 * Identifies the vendor of a cataloging record from its tag signatures
 * @module marc/vendor-identifier
 */

import type { VendorRule, VendorSignature } from '../types/config'
import type { MarcRecord } from '../types/marc'
import type { VendorInfo } from '../types/record'
import { ConfigurationError } from '../utils/errors.js'
import { firstSubfieldValue } from './marc-record.js'

export const UNKNOWN_VENDOR = 'UNKNOWN'

function matchesSignature(record: MarcRecord, signature: VendorSignature | undefined): boolean {
  const expected = Object.entries(signature ?? {})
  if (expected.length === 0) return false
  return expected.every(
    ([tag, { code, value }]) => firstSubfieldValue(record, tag, code) === value,
  )
}

function toVendorInfo(rule: VendorRule): VendorInfo {
  return {
    name: rule.name,
    bibFields: rule.bibFields,
    matchpoints: rule.matchpoints,
  }
}

/**
 * Tries vendors in table order, the primary signature before the alternate.
 * A record matching no signature is attributed to the `UNKNOWN` entry.
 *
 * @throws {ConfigurationError} If the table has no `UNKNOWN` entry
 */
export function identifyVendor(record: MarcRecord, vendors: readonly VendorRule[]): VendorInfo {
  for (const rule of vendors) {
    if (matchesSignature(record, rule.primary) || matchesSignature(record, rule.alternate)) {
      return toVendorInfo(rule)
    }
  }
  const fallback = vendors.find((rule) => rule.name === UNKNOWN_VENDOR)
  if (!fallback) {
    throw new ConfigurationError(`Vendor table has no ${UNKNOWN_VENDOR} entry`, 'vendors')
  }
  return toVendorInfo(fallback)
}
