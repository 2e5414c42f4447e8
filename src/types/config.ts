import type {
  Collection,
  LibrarySystem,
  Matchpoints,
  OrderAttribute,
  VendorBibField,
} from './record'

/**
 * Order attribute written to each subfield code of an order tag,
 * e.g. `{ '960': { u: 'fund' } }`.
 */
export type OrderFieldRules = Readonly<Record<string, Readonly<Record<string, OrderAttribute>>>>

/**
 * Tag and indicators that mark an item field.
 */
export interface ItemFieldPattern {
  tag: string
  ind1: string
  ind2: string
}

/**
 * Field marking records whose items come from an external source, and the
 * item pattern those records use instead of the library's own.
 */
export interface ExternalItemSource {
  tag: string
  code: string
  value: string
  itemField: ItemFieldPattern
}

/**
 * Expected subfield value for each tag of a vendor signature.
 */
export type VendorSignature = Readonly<Record<string, { code: string; value: string }>>

/**
 * One entry of a library's vendor table.
 */
export interface VendorRule {
  name: string
  /** Tried first */
  primary: VendorSignature
  alternate?: VendorSignature
  bibFields: readonly VendorBibField[]
  matchpoints: Matchpoints
}

/**
 * Rules that differ between library systems.
 */
export interface LibraryRules {
  /** Tag holding the catalog id */
  bibIdTag: string
  /** Tag holding the branch call number */
  callNumberTag: string
  itemField: ItemFieldPattern
  externalItemSource?: ExternalItemSource
  /** Vendors in identification order; must contain an `UNKNOWN` entry */
  vendors: readonly VendorRule[]
  /** Location written into selection command tags, per collection */
  defaultLocations: Readonly<Partial<Record<Collection, string>>>
}

/**
 * Explicit configuration passed into every engine entry point.
 */
export interface EngineConfig {
  libraries: Readonly<Record<LibrarySystem, LibraryRules>>
  orderFieldRules: OrderFieldRules
  /** Tag of the collection-code field (nypl only) */
  collectionTag: string
  /** Tag of the selection command field */
  commandTag: string
  /** Vendor whose branch call numbers are rebuilt on load */
  callNumberVendor: string
  /** Vendors attached rather than inserted when nothing matched (bpl) */
  attachOnNoMatchVendors: readonly string[]
  /** Per-lookup timeout in milliseconds */
  lookupTimeoutMs: number
  /** Records processed at once within a batch */
  concurrency: number
}
