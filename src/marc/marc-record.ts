/**
 * Read helpers for the structured MARC form
 * @module marc/marc-record
 */

import type {
  ControlField,
  DataField,
  MarcField,
  MarcRecord,
  Subfield,
} from '../types/marc'

/**
 * Whether a field is a control field (carries data rather than subfields)
 */
export function isControlField(field: MarcField): field is ControlField {
  return 'data' in field
}

export function isDataField(field: MarcField): field is DataField {
  return !isControlField(field)
}

/**
 * Creates a data field. Empty indicators are written as blanks.
 */
export function createDataField(
  tag: string,
  indicators: readonly [string, string],
  subfields: readonly Subfield[],
): DataField {
  return {
    tag,
    indicators: [indicators[0] || ' ', indicators[1] || ' '],
    subfields,
  }
}

export function getFields(record: MarcRecord, tag: string): MarcField[] {
  return record.fields.filter((field) => field.tag === tag)
}

export function getDataFields(record: MarcRecord, tag: string): DataField[] {
  return record.fields.filter(
    (field): field is DataField => field.tag === tag && isDataField(field),
  )
}

/**
 * Data of the first control field with the tag
 */
export function controlValue(record: MarcRecord, tag: string): string | null {
  const field = record.fields.find(
    (candidate): candidate is ControlField => candidate.tag === tag && isControlField(candidate),
  )
  return field?.data ?? null
}

/**
 * First value of a subfield code, or `null`
 */
export function subfieldValue(field: DataField, code: string): string | null {
  return field.subfields.find((subfield) => subfield.code === code)?.value ?? null
}

export function subfieldValues(field: DataField, code: string): string[] {
  return field.subfields
    .filter((subfield) => subfield.code === code)
    .map((subfield) => subfield.value)
}

/**
 * First value of a subfield code in the first field with the tag
 */
export function firstSubfieldValue(record: MarcRecord, tag: string, code: string): string | null {
  const [field] = getDataFields(record, tag)
  return field ? subfieldValue(field, code) : null
}

/**
 * Field value as compared by edits: control data, or subfield values joined by spaces
 */
export function fieldValue(field: MarcField): string {
  if (isControlField(field)) return field.data
  return field.subfields.map((subfield) => subfield.value).join(' ')
}

function tagNumber(tag: string): number {
  const numeric = Number.parseInt(tag, 10)
  return Number.isNaN(numeric) ? Number.POSITIVE_INFINITY : numeric
}

/**
 * Inserts a field before the first field with a greater tag, or appends it.
 * Returns a new field list.
 */
export function insertOrdered(fields: readonly MarcField[], field: MarcField): MarcField[] {
  const position = fields.findIndex((existing) => tagNumber(existing.tag) > tagNumber(field.tag))
  if (position === -1) return [...fields, field]
  return [...fields.slice(0, position), field, ...fields.slice(position)]
}
