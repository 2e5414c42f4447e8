import type { Collection } from './record'

/**
 * Whether a catalog record was created in-house or supplied by a vendor.
 * Vendor records may be overlaid by newer vendor data.
 */
export type CatalogingSource = 'inhouse' | 'vendor'

/**
 * Identifiers carried by a catalog search hit.
 */
export interface CandidateIdentifiers {
  controlNumber: string | null
  isbn: readonly string[]
  oclcNumbers: readonly string[]
  upc: readonly string[]
}

/**
 * Read-only projection of one catalog search hit, common to every backend.
 */
export interface Candidate {
  /** Catalog id, `.b` prefixed */
  bibId: string
  title: string | null
  /** Collection, `null` when the library system has none */
  collection: Collection | null
  branchCallNumber: string | null
  researchCallNumber: readonly string[]
  catSource: CatalogingSource
  updateDate: Date | null
  identifiers: CandidateIdentifiers
  /** Item barcodes, where the backend exposes them */
  barcodes: readonly string[]
}
