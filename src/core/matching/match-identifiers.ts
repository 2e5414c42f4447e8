import type { BibRecord, IdentifierKind } from '../../types/record'

/**
 * Whether the research call number is authoritative for the record
 */
export function usesResearchCallNumber(record: Pick<BibRecord, 'library' | 'collection'>): boolean {
  return record.library === 'nypl' && record.collection === 'RL'
}

/**
 * Call number of the incoming record used for agreement checks and reports
 */
export function getInputCallNumber(record: BibRecord): string | null {
  const callNumbers = usesResearchCallNumber(record)
    ? record.researchCallNumber
    : record.branchCallNumber
  return callNumbers[0] ?? null
}

/**
 * Identifier shown for the record in reports: bib id, control number,
 * ISBN, first OCLC number or UPC, whichever is present first
 */
export function getResourceId(record: BibRecord): string | null {
  return (
    record.bibId ??
    record.controlNumber ??
    record.isbn ??
    record.oclcNumbers[0] ??
    record.upc ??
    null
  )
}

/**
 * Raw value of an identifier kind on the record
 */
export function getIdentifierValue(record: BibRecord, kind: IdentifierKind): string | null {
  switch (kind) {
    case 'bibId':
      return record.bibId
    case 'isbn':
      return record.isbn
    case 'oclcNumber':
      return record.oclcNumbers[0] ?? null
    case 'upc':
      return record.upc
  }
}
