/**
 * Parses documents returned by the BPL Solr search service
 * @module services/sources/solr-response
 */

import type { Candidate } from '../../types/candidate'
import { normalizeBibId } from '../../core/normalizers/identifier.js'
import { parseMarcTimestamp } from '../../core/normalizers/date.js'
import type { JsonObject } from './json-fields.js'
import { stringArrayField, stringField, uniqueValues } from './json-fields.js'
import { isPlainObject } from '../../utils/errors.js'
import type { VarField } from './var-fields.js'
import { subfieldContents, varFieldsWithTag, varFieldValue } from './var-fields.js'

const FIELD_SEPARATOR = ' || '

/**
 * Reads `sm_bib_varfields` entries of the form `099 || {{a}} FIC || {{b}} SMITH`.
 * Entries without subfield markers are skipped.
 */
function readVarFields(data: JsonObject): VarField[] {
  const fields: VarField[] = []
  for (const entry of stringArrayField(data, 'sm_bib_varfields')) {
    const separator = entry.indexOf(FIELD_SEPARATOR)
    if (separator === -1) continue
    const tag = entry.slice(0, separator)
    const body = entry.slice(separator + FIELD_SEPARATOR.length)
    if (!body.includes('{{')) continue
    fields.push({
      tag,
      ind1: ' ',
      ind2: ' ',
      subfields: body.split(FIELD_SEPARATOR).map((part) => {
        const [code, content = ''] = part.split('}}')
        return { code: code.replace(/^\{+/, ''), content: content.trim() }
      }),
    })
  }
  return fields
}

function readBarcodes(data: JsonObject): string[] {
  return stringArrayField(data, 'sm_item_data')
    .filter((item) => item.length > 0)
    .map((item): unknown => JSON.parse(item))
    .filter(isPlainObject)
    .map((item) => stringField(item, 'barcode'))
    .filter((barcode): barcode is string => !!barcode)
}

/**
 * Maps one Solr document to a candidate. Returns `null` for a document without an id.
 *
 * BPL has no collections. A record is in-house when its 001 starts with `o`
 * and its 003 is `OCoLC`.
 */
export function parseSolrDoc(data: JsonObject): Candidate | null {
  const bibId = normalizeBibId(stringField(data, 'id'))
  if (!bibId) return null

  const varFields = readVarFields(data)
  const controlNumber = stringField(data, 'ss_marc_tag_001')
  const branchCallNumbers = uniqueValues([
    ...varFieldsWithTag(varFields, ['099']).map(varFieldValue),
    stringField(data, 'call_number'),
  ])

  return {
    bibId,
    title: stringField(data, 'title'),
    collection: null,
    branchCallNumber: branchCallNumbers[0] ?? null,
    researchCallNumber: [],
    catSource:
      controlNumber?.startsWith('o') && stringField(data, 'ss_marc_tag_003') === 'OCoLC'
        ? 'inhouse'
        : 'vendor',
    updateDate: parseMarcTimestamp(stringField(data, 'ss_marc_tag_005')),
    identifiers: {
      controlNumber,
      isbn: uniqueValues([
        ...subfieldContents(varFields, ['020'], 'a'),
        ...stringArrayField(data, 'isbn'),
      ]),
      oclcNumbers: uniqueValues([...subfieldContents(varFields, ['035'], 'a'), controlNumber]),
      upc: uniqueValues(subfieldContents(varFields, ['024', '028'], 'a')),
    },
    barcodes: readBarcodes(data),
  }
}
