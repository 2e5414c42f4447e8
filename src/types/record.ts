import type { MarcRecord } from './marc'

/**
 * Library systems served by the engine.
 * `'nypl'` has Branch and Research collections; `'bpl'` has none.
 */
export type LibrarySystem = 'nypl' | 'bpl'

/**
 * Catalog partition a record or candidate belongs to.
 * - `'BL'`: Branch libraries
 * - `'RL'`: Research libraries
 * - `'MIXED'`: held by both partitions
 * - `'NONE'`: the library system has no partitions
 */
export type Collection = 'BL' | 'RL' | 'MIXED' | 'NONE'

/**
 * Workflow (record type) a batch was loaded under.
 * - `'cat'`: full cataloging records from a vendor
 * - `'acq'`: acquisitions brief records carrying orders
 * - `'sel'`: selection brief records carrying orders
 */
export type Workflow = 'cat' | 'acq' | 'sel'

/** Identifier a record can be matched on */
export type IdentifierKind = 'bibId' | 'isbn' | 'oclcNumber' | 'upc'

/** Priority slot of a matchpoint */
export type MatchpointPriority = 'primary' | 'secondary' | 'tertiary'

/**
 * Priority-keyed matchpoints. Iteration always follows {@link MATCHPOINT_ORDER},
 * never the key insertion order of the object.
 */
export type Matchpoints = Partial<Readonly<Record<MatchpointPriority, IdentifierKind>>>

export const MATCHPOINT_ORDER: readonly MatchpointPriority[] = ['primary', 'secondary', 'tertiary']

export const IDENTIFIER_KINDS: readonly IdentifierKind[] = ['bibId', 'isbn', 'oclcNumber', 'upc']

export const LIBRARY_SYSTEMS: readonly LibrarySystem[] = ['nypl', 'bpl']

export const COLLECTIONS: readonly Collection[] = ['BL', 'RL', 'MIXED', 'NONE']

export const WORKFLOWS: readonly Workflow[] = ['cat', 'acq', 'sel']

/**
 * Order line attributes in the order their fields are written.
 */
export const ORDER_ATTRIBUTES = [
  'orderCode1',
  'orderCode2',
  'orderCode3',
  'orderCode4',
  'format',
  'orderType',
  'status',
  'copies',
  'createDate',
  'price',
  'locations',
  'fund',
  'vendorCode',
  'lang',
  'country',
  'orderId',
  'audience',
  'internalNote',
  'selectorNote',
  'vendorNotes',
  'vendorTitleNo',
  'varFieldIsbn',
  'blanketPo',
] as const

export type OrderAttribute = (typeof ORDER_ATTRIBUTES)[number]

/** Value held by an order attribute; lists expand to one subfield per entry */
export type OrderValue = string | number | readonly string[] | null

/**
 * One acquisitions or selection order attached to a record.
 * Absent attributes are simply not written.
 */
export type OrderLine = Readonly<Partial<Record<OrderAttribute, OrderValue>>>

/**
 * Values from an order template. Keys that are not order attributes are ignored
 * by the overlay but may still be read by other rules (`format`).
 */
export type OrderTemplate = Readonly<Record<string, OrderValue | undefined>>

/**
 * A field a vendor requires on every record it supplies.
 * Empty indicators are written as a blank.
 */
export interface VendorBibField {
  tag: string
  ind1: string
  ind2: string
  subfieldCode: string
  value: string
}

/**
 * Identifies the vendor that produced a record.
 */
export interface VendorInfo {
  /** Vendor name, `'UNKNOWN'` when no signature matched */
  readonly name: string
  /** Fields injected verbatim into cataloging records */
  readonly bibFields: readonly VendorBibField[]
  /** Matchpoints used for cataloging records from this vendor */
  readonly matchpoints: Matchpoints
}

/**
 * The in-memory form of one incoming bibliographic record.
 * Records are never mutated; each pipeline step produces new values.
 */
export interface BibRecord {
  library: LibrarySystem
  workflow: Workflow
  collection: Collection
  /** Catalog id (`.b` prefixed), usually absent on incoming records */
  bibId: string | null
  /** Value of the 001 control field */
  controlNumber: string | null
  isbn: string | null
  oclcNumbers: readonly string[]
  upc: string | null
  /** Branch call numbers; agreement uses the first */
  branchCallNumber: readonly string[]
  researchCallNumber: readonly string[]
  title: string | null
  /** Vendor name */
  vendor: string | null
  vendorInfo: VendorInfo | null
  /** Last update timestamp (MARC 005) */
  updateDate: Date | null
  barcodes: readonly string[]
  orders: readonly OrderLine[]
  /** Structured form of the payload the rule engine edits */
  marc: MarcRecord
}
