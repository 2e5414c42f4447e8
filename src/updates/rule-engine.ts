/**
 * Computes the field edits applied to a record before it is written
 * @module updates/rule-engine
 */

import type { EngineConfig, OrderFieldRules } from '../types/config'
import type { FieldEdit } from '../types/marc'
import { LEADER_TAG } from '../types/marc'
import type { MatchDecision } from '../types/match'
import type { BibRecord, OrderTemplate, VendorInfo } from '../types/record'
import { normalizeBibId } from '../core/normalizers/identifier.js'
import { getResourceId } from '../core/matching/match-identifiers.js'
import { fieldValue, getDataFields } from '../marc/marc-record.js'
import { TemplateMissingError, VendorInfoMissingError } from '../utils/errors.js'
import { parseCallNumber } from './call-number.js'
import { commandTagEdit } from './command-tag.js'
import { applyOrderTemplate, hasValue, mapOrderToFields } from './order-template.js'

/** Leader/09 set to `a`: UCS/Unicode character coding */
const UNICODE_LEADER_EDIT: FieldEdit = { tag: LEADER_TAG, position: 9, data: 'a', delete: false }

function vendorFieldEdits(vendorInfo: VendorInfo): FieldEdit[] {
  return vendorInfo.bibFields.map((field): FieldEdit => ({
    tag: field.tag,
    indicators: [field.ind1 || ' ', field.ind2 || ' '],
    subfields: [{ code: field.subfieldCode, value: field.value }],
    delete: false,
  }))
}

function bibIdEdits(targetId: string, tag: string): FieldEdit[] {
  const bibId = normalizeBibId(targetId)
  if (!bibId) return []
  return [
    { tag, delete: true },
    { tag, indicators: [' ', ' '], subfields: [{ code: 'a', value: bibId }], delete: false },
  ]
}

function collectionEdits(record: BibRecord, config: EngineConfig): FieldEdit[] {
  if (record.collection !== 'BL' && record.collection !== 'RL') return []
  return [
    { tag: config.collectionTag, delete: true },
    {
      tag: config.collectionTag,
      indicators: [' ', ' '],
      subfields: [{ code: 'a', value: record.collection }],
      delete: false,
    },
  ]
}

function callNumberEdits(record: BibRecord, config: EngineConfig): FieldEdit[] {
  if (
    record.collection !== 'BL' ||
    record.workflow !== 'cat' ||
    record.vendor !== config.callNumberVendor
  ) {
    return []
  }
  const tag = config.libraries[record.library].callNumberTag
  const [field] = getDataFields(record.marc, tag)
  if (!field) return []
  return [
    {
      tag,
      indicators: [' ', ' '],
      subfields: parseCallNumber(fieldValue(field)),
      delete: true,
    },
  ]
}

function orderEdits(
  record: BibRecord,
  template: OrderTemplate,
  rules: OrderFieldRules,
): FieldEdit[] {
  if (record.orders.length === 0) return []
  return [
    ...Object.keys(rules).map((tag): FieldEdit => ({ tag, delete: true })),
    ...record.orders.flatMap((order) => mapOrderToFields(applyOrderTemplate(order, template), rules)),
  ]
}

function templateFormat(template: OrderTemplate): string | null {
  const format = template.format
  return typeof format === 'string' && hasValue(format) ? format : null
}

/**
 * Computes the ordered edits for one record. Nothing is mutated.
 *
 * 1. cataloging: the vendor's fields
 * 2. acquisitions and selection: the order fields rewritten from each order line with the
 *    template overlaid
 * 3. selection: the command tag
 * 4. when the decision has a target: the bib id field, replaced
 * 5. nypl: the collection field, replaced; cataloging Branch records from the
 *    call-number vendor get their call number split into coded subfields
 * 6. every record: the leader marked as Unicode
 *
 * @throws {VendorInfoMissingError} For a cataloging record without vendor information
 * @throws {TemplateMissingError} For an acquisitions or selection record without template data
 * @throws {CallNumberIntegrityError} If the call number cannot be split faithfully
 */
export function computeFieldEdits(
  record: BibRecord,
  decision: MatchDecision,
  vendorInfo: VendorInfo | null,
  templateData: OrderTemplate | null,
  config: EngineConfig,
): FieldEdit[] {
  const edits: FieldEdit[] = []
  const rules = config.libraries[record.library]

  if (record.workflow === 'cat') {
    if (!vendorInfo) {
      throw new VendorInfoMissingError(getResourceId(record))
    }
    edits.push(...vendorFieldEdits(vendorInfo))
  } else {
    if (!templateData || Object.keys(templateData).length === 0) {
      throw new TemplateMissingError(record.workflow)
    }
    edits.push(...orderEdits(record, templateData, config.orderFieldRules))
    if (record.workflow === 'sel') {
      const command = commandTagEdit(record.marc, {
        tag: config.commandTag,
        format: templateFormat(templateData),
        defaultLocation: rules.defaultLocations[record.collection],
      })
      if (command) edits.push(command)
    }
  }

  if (decision.targetId) {
    edits.push(...bibIdEdits(decision.targetId, rules.bibIdTag))
  }

  if (record.library === 'nypl') {
    edits.push(...collectionEdits(record, config))
    edits.push(...callNumberEdits(record, config))
  }

  edits.push({ ...UNICODE_LEADER_EDIT })
  return edits
}
