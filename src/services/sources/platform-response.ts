/**
 * Parses bib objects returned by the NYPL Platform API
 * @module services/sources/platform-response
 */

import type { Candidate } from '../../types/candidate'
import type { Collection } from '../../types/record'
import { COLLECTIONS } from '../../types/record'
import { normalizeBibId } from '../../core/normalizers/identifier.js'
import { parseIsoTimestamp } from '../../core/normalizers/date.js'
import type { JsonObject } from './json-fields.js'
import { objectArrayField, stringArrayField, stringField, uniqueValues } from './json-fields.js'
import type { VarField } from './var-fields.js'
import { subfieldContents, varFieldsWithTag, varFieldValue } from './var-fields.js'

function readVarFields(data: JsonObject): VarField[] {
  return objectArrayField(data, 'varFields').map((field) => ({
    tag: stringField(field, 'marcTag') ?? '',
    ind1: stringField(field, 'ind1') ?? ' ',
    ind2: stringField(field, 'ind2') ?? ' ',
    subfields: objectArrayField(field, 'subfields').map((subfield) => ({
      code: stringField(subfield, 'tag') ?? '',
      content: stringField(subfield, 'content') ?? '',
    })),
  }))
}

function inferCollection(
  varFields: readonly VarField[],
  branchCallNumber: string | null,
  researchCallNumber: readonly string[],
): Collection | null {
  const codes = subfieldContents(varFields, ['910'], 'a')
  if (codes.length > 1) return 'MIXED'
  if (codes.length === 1) {
    return COLLECTIONS.find((collection) => collection === codes[0].trim()) ?? null
  }
  const hasResearch = researchCallNumber.length > 0
  if (branchCallNumber && hasResearch) return 'MIXED'
  if (branchCallNumber) return 'BL'
  if (hasResearch) return 'RL'
  return null
}

/**
 * Maps one Platform bib to a candidate. Returns `null` for a bib without an id.
 *
 * - Branch call number: first 091
 * - Research call numbers: 852 with first indicator `8`
 * - In-house when any 901 $b contains `CAT`
 * - Collection from 910 $a, else inferred from the call numbers present
 */
export function parsePlatformBib(data: JsonObject): Candidate | null {
  const bibId = normalizeBibId(stringField(data, 'id'))
  if (!bibId) return null

  const varFields = readVarFields(data)
  const branchCallNumber = varFieldsWithTag(varFields, ['091']).map(varFieldValue)[0] ?? null
  const researchCallNumber = varFieldsWithTag(varFields, ['852'])
    .filter((field) => field.ind1 === '8')
    .map(varFieldValue)
  const controlNumber = stringField(data, 'controlNumber')

  return {
    bibId,
    title: stringField(data, 'title'),
    collection: inferCollection(varFields, branchCallNumber, researchCallNumber),
    branchCallNumber,
    researchCallNumber,
    catSource: subfieldContents(varFields, ['901'], 'b').some((value) => value.includes('CAT'))
      ? 'inhouse'
      : 'vendor',
    updateDate: parseIsoTimestamp(stringField(data, 'updatedDate')),
    identifiers: {
      controlNumber,
      isbn: uniqueValues([
        ...subfieldContents(varFields, ['020'], 'a'),
        ...stringArrayField(data, 'standardNumbers'),
      ]),
      oclcNumbers: uniqueValues([...subfieldContents(varFields, ['035'], 'a'), controlNumber]),
      upc: uniqueValues(subfieldContents(varFields, ['024', '028'], 'a')),
    },
    barcodes: [],
  }
}
