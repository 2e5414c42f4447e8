import type { IdentifierKind } from '../../types/record'
import type { NormalizerFunction } from './types'

const OCLC_PREFIXES = ['(OCoLC)', 'ocm', 'ocn', 'on']

function asTrimmedString(value: unknown): string | null {
  if (value == null) return null
  const text = String(value).trim()
  return text.length > 0 ? text : null
}

/**
 * Normalizes an ISBN: drops any qualifier and keeps only digits and `X`.
 *
 * @example
 * ```typescript
 * normalizeIsbn('978-0-306-40615-7 (pbk.)') // '9780306406157'
 * normalizeIsbn('0306406152x') // '030640615X'
 * ```
 */
export const normalizeIsbn: NormalizerFunction = (value: unknown): string | null => {
  const text = asTrimmedString(value)
  if (text === null) return null
  const [head] = text.split(/\s+/)
  const isbn = head.toUpperCase().replace(/[^0-9X]/g, '')
  return isbn.length > 0 ? isbn : null
}

/**
 * Strips the OCLC prefixes (`(OCoLC)`, `ocm`, `ocn`, `on`) from a control number.
 *
 * @example
 * ```typescript
 * normalizeOclcNumber('(OCoLC)ocm00012345') // '00012345'
 * normalizeOclcNumber('on1234567890') // '1234567890'
 * ```
 */
export const normalizeOclcNumber: NormalizerFunction = (value: unknown): string | null => {
  let text = asTrimmedString(value)
  if (text === null) return null
  for (const prefix of OCLC_PREFIXES) {
    if (text.startsWith(prefix)) {
      text = text.slice(prefix.length).trim()
    }
  }
  return text.length > 0 ? text : null
}

/**
 * Writes a catalog id with exactly one `.b` prefix.
 *
 * @example
 * ```typescript
 * normalizeBibId('12345678') // '.b12345678'
 * normalizeBibId('.b12345678') // '.b12345678'
 * ```
 */
export const normalizeBibId: NormalizerFunction = (value: unknown): string | null => {
  const text = asTrimmedString(value)
  if (text === null) return null
  const digits = text.replace(/^[.b]+/, '')
  return digits.length > 0 ? `.b${digits}` : null
}

/**
 * Trims a UPC; UPCs are compared as written.
 */
export const normalizeUpc: NormalizerFunction = (value: unknown): string | null =>
  asTrimmedString(value)

/**
 * Numeric part of a catalog id, used to order candidates.
 * Ids without digits sort last.
 */
export function bibIdNumber(bibId: string): number {
  const numeric = Number.parseInt(bibId.replace(/^\D+/, ''), 10)
  return Number.isNaN(numeric) ? Number.POSITIVE_INFINITY : numeric
}

/**
 * Normalizer applied to a matchpoint value before it is sent to a source.
 */
export const IDENTIFIER_NORMALIZERS: Readonly<Record<IdentifierKind, NormalizerFunction>> = {
  bibId: normalizeBibId,
  isbn: normalizeIsbn,
  oclcNumber: normalizeOclcNumber,
  upc: normalizeUpc,
}
