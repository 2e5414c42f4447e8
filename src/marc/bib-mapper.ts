/**
 * Derives the in-memory record from its structured MARC form
 * @module marc/bib-mapper
 */

import type { EngineConfig, OrderFieldRules } from '../types/config'
import type { DataField, MarcRecord } from '../types/marc'
import type {
  BibRecord,
  Collection,
  LibrarySystem,
  OrderAttribute,
  OrderLine,
  OrderValue,
  Workflow,
} from '../types/record'
import {
  normalizeBibId,
  normalizeIsbn,
  normalizeOclcNumber,
  normalizeUpc,
} from '../core/normalizers/identifier.js'
import { parseMarcTimestamp } from '../core/normalizers/date.js'
import { getBarcodes, itemFieldPatternFor } from './item-fields.js'
import {
  controlValue,
  fieldValue,
  firstSubfieldValue,
  getDataFields,
  subfieldValues,
} from './marc-record.js'
import { identifyVendor } from './vendor-identifier.js'

/** Order attributes written as one subfield per value */
export const LIST_ORDER_ATTRIBUTES: readonly OrderAttribute[] = ['locations', 'varFieldIsbn']

/**
 * Batch-level facts the record itself does not carry.
 */
export interface MappingContext {
  library: LibrarySystem
  workflow: Workflow
  collection: Collection
  /** Vendor chosen on the order template (acquisitions and selection) */
  vendor?: string | null
}

function oclcNumbers(marc: MarcRecord): string[] {
  const raw: string[] = []
  const controlNumber = controlValue(marc, '001')
  if (controlNumber && controlValue(marc, '003') === 'OCoLC') {
    raw.push(controlNumber)
  }
  for (const field of getDataFields(marc, '035')) {
    raw.push(...subfieldValues(field, 'a').filter((value) => value.startsWith('(OCoLC)')))
  }
  const normalized = raw
    .map((value) => normalizeOclcNumber(value))
    .filter((value): value is string => value !== null)
  return [...new Set(normalized)]
}

function orderFromFields(
  fields: readonly (DataField | undefined)[],
  rules: OrderFieldRules,
): OrderLine {
  const order: Partial<Record<OrderAttribute, OrderValue>> = {}
  for (const field of fields) {
    if (!field) continue
    const mapping = rules[field.tag] ?? {}
    for (const [code, attribute] of Object.entries(mapping)) {
      const values = subfieldValues(field, code)
      if (values.length === 0) continue
      order[attribute] = LIST_ORDER_ATTRIBUTES.includes(attribute) ? values : values[0]
    }
  }
  return order
}

/**
 * One order line per 960 field, paired by position with the 961 fields.
 */
export function mapOrders(marc: MarcRecord, rules: OrderFieldRules): OrderLine[] {
  const notes = getDataFields(marc, '961')
  return getDataFields(marc, '960').map((field, index) =>
    orderFromFields([field, notes[index]], rules),
  )
}

/**
 * Maps a structured MARC record to the record the engine reconciles.
 *
 * @example
 * ```typescript
 * const record = mapBibRecord(marc, { library: 'nypl', workflow: 'cat', collection: 'BL' }, config)
 * record.vendorInfo?.name // 'INGRAM'
 * ```
 */
export function mapBibRecord(
  marc: MarcRecord,
  context: MappingContext,
  config: EngineConfig,
): BibRecord {
  const rules = config.libraries[context.library]
  const vendorInfo =
    context.workflow === 'cat' ? identifyVendor(marc, rules.vendors) : null

  return {
    library: context.library,
    workflow: context.workflow,
    collection: context.collection,
    bibId: normalizeBibId(firstSubfieldValue(marc, rules.bibIdTag, 'a')),
    controlNumber: controlValue(marc, '001'),
    isbn: normalizeIsbn(firstSubfieldValue(marc, '020', 'a')),
    oclcNumbers: oclcNumbers(marc),
    upc: normalizeUpc(firstSubfieldValue(marc, '024', 'a')),
    branchCallNumber: getDataFields(marc, rules.callNumberTag).map(fieldValue),
    researchCallNumber:
      context.library === 'nypl'
        ? getDataFields(marc, '852')
            .filter((field) => field.indicators[0] === '8')
            .map(fieldValue)
        : [],
    title: getDataFields(marc, '245').map(fieldValue)[0] ?? null,
    vendor: vendorInfo ? vendorInfo.name : (context.vendor ?? null),
    vendorInfo,
    updateDate: parseMarcTimestamp(controlValue(marc, '005')),
    barcodes: getBarcodes(marc, itemFieldPatternFor(marc, rules)),
    orders: context.workflow === 'cat' ? [] : mapOrders(marc, config.orderFieldRules),
    marc,
  }
}
