import type { ItemFieldPattern, LibraryRules } from '../types/config'
import type { DataField, MarcField, MarcRecord } from '../types/marc'
import { getDataFields, isDataField, subfieldValues } from './marc-record.js'

/** Subfield holding an item barcode */
export const BARCODE_SUBFIELD = 'i'

/**
 * Whether a field is an item field: tag and both indicators match the pattern.
 */
export function isItemField(field: MarcField, pattern: ItemFieldPattern): field is DataField {
  return (
    field.tag === pattern.tag &&
    isDataField(field) &&
    field.indicators[0] === pattern.ind1 &&
    field.indicators[1] === pattern.ind2
  )
}

export function getItemFields(record: MarcRecord, pattern: ItemFieldPattern): DataField[] {
  return record.fields.filter((field): field is DataField => isItemField(field, pattern))
}

/**
 * Barcodes of every item field, in field order
 */
export function getBarcodes(record: MarcRecord, pattern: ItemFieldPattern): string[] {
  return getItemFields(record, pattern).flatMap((field) => subfieldValues(field, BARCODE_SUBFIELD))
}

/**
 * Item pattern of one record: the external source's pattern when the record
 * carries the source's field, the library's otherwise.
 */
export function itemFieldPatternFor(
  record: MarcRecord,
  rules: Pick<LibraryRules, 'itemField' | 'externalItemSource'>,
): ItemFieldPattern {
  const source = rules.externalItemSource
  if (!source) return rules.itemField
  const external = getDataFields(record, source.tag).some((field) =>
    subfieldValues(field, source.code).includes(source.value),
  )
  return external ? source.itemField : rules.itemField
}
