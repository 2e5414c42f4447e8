/**
 * Selection command tag (`*b2=...;bn=...;`) synthesis
 * @module updates/command-tag
 */

import type { DataField, FieldEdit, MarcRecord } from '../types/marc'
import { fieldValue, getDataFields, subfieldValue } from '../marc/marc-record.js'

const LOCATION_DIRECTIVE = 'bn='

function isCommandField(field: DataField): boolean {
  return (
    field.indicators[0] === ' ' &&
    field.indicators[1] === ' ' &&
    (subfieldValue(field, 'a') ?? '').startsWith('*')
  )
}

export interface CommandTagOptions {
  tag: string
  /** Material format from the order template */
  format?: string | null
  /** Default location for the record's library and collection */
  defaultLocation?: string | null
}

/**
 * Computes the command tag edit for a selection record, or `null` when the
 * record needs none.
 *
 * - an existing command with a location directive is left alone
 * - an existing command without one gains the default location
 * - otherwise a command is built from the format and default location
 */
export function commandTagEdit(record: MarcRecord, options: CommandTagOptions): FieldEdit | null {
  const { tag, format, defaultLocation } = options
  const existing = getDataFields(record, tag).find(isCommandField)

  if (existing) {
    const command = subfieldValue(existing, 'a') ?? ''
    if (command.includes(LOCATION_DIRECTIVE) || !defaultLocation) return null
    const separator = command.trimEnd().endsWith(';') ? '' : ';'
    return {
      tag,
      indicators: [' ', ' '],
      subfields: [{ code: 'a', value: `${command}${separator}${LOCATION_DIRECTIVE}${defaultLocation};` }],
      delete: true,
      replaces: fieldValue(existing),
    }
  }

  const directives: string[] = []
  if (format) directives.push(`b2=${format}`)
  if (defaultLocation) directives.push(`${LOCATION_DIRECTIVE}${defaultLocation}`)
  if (directives.length === 0) return null

  return {
    tag,
    indicators: [' ', ' '],
    subfields: [{ code: 'a', value: `*${directives.join(';')};` }],
    delete: false,
  }
}
