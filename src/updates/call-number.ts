/**
 * Splits a branch call number into its coded parts
 * @module updates/call-number
 */

import type { Subfield } from '../types/marc'
import { CallNumberIntegrityError } from '../utils/errors.js'

interface MainClass {
  marker: string
  value: string
  /** Marker must open the call number rather than appear anywhere */
  leading: boolean
}

const MAIN_CLASSES: readonly MainClass[] = [
  { marker: 'GN FIC ', value: 'GN FIC', leading: false },
  { marker: 'FIC ', value: 'FIC', leading: false },
  { marker: 'PIC ', value: 'PIC', leading: false },
  { marker: 'J E ', value: 'E', leading: true },
  { marker: 'J SPA E ', value: 'E', leading: true },
]

const FORMATS = ['GRAPHIC', 'HOLIDAY', 'YR']

function prefixSubfield(callNumber: string): Subfield | null {
  if (callNumber.startsWith('J SPA ')) return { code: 'p', value: 'J SPA' }
  if (callNumber.startsWith('J ')) return { code: 'p', value: 'J' }
  return null
}

function formatSubfield(callNumber: string): Subfield | null {
  const format = FORMATS.find((candidate) => callNumber.includes(`${candidate} `))
  return format ? { code: 'f', value: format } : null
}

/**
 * Parses a call number into prefix (`p`), format (`f`), main class (`a`) and
 * cutter (`c`) subfields. Each category takes its first matching marker; the
 * cutter is everything after the main class marker.
 *
 * @throws {CallNumberIntegrityError} If the parts joined with spaces differ from the input
 *
 * @example
 * ```typescript
 * parseCallNumber('J SPA FIC GARCIA')
 * // [{ code: 'p', value: 'J SPA' }, { code: 'a', value: 'FIC' }, { code: 'c', value: 'GARCIA' }]
 * ```
 */
export function parseCallNumber(callNumber: string): Subfield[] {
  const subfields: Subfield[] = []
  let position = 0

  const prefix = prefixSubfield(callNumber)
  if (prefix) subfields.push(prefix)

  const format = formatSubfield(callNumber)
  if (format) subfields.push(format)

  for (const main of MAIN_CLASSES) {
    const index = main.leading
      ? (callNumber.startsWith(main.marker) ? 0 : -1)
      : callNumber.indexOf(main.marker)
    if (index !== -1) {
      position = index + main.marker.length
      subfields.push({ code: 'a', value: main.value })
      break
    }
  }

  subfields.push({ code: 'c', value: callNumber.slice(position) })

  const reconstructed = subfields.map((subfield) => subfield.value).join(' ')
  if (reconstructed !== callNumber) {
    throw new CallNumberIntegrityError(callNumber, reconstructed)
  }
  return subfields
}
