/**
 * Validation of engine configuration read from rule files
 * @module config/validation
 */

import type {
  EngineConfig,
  ExternalItemSource,
  ItemFieldPattern,
  LibraryRules,
  OrderFieldRules,
  VendorRule,
  VendorSignature,
} from '../types/config'
import type {
  Collection,
  IdentifierKind,
  LibrarySystem,
  Matchpoints,
  MatchpointPriority,
  OrderAttribute,
  VendorBibField,
} from '../types/record'
import {
  COLLECTIONS,
  IDENTIFIER_KINDS,
  MATCHPOINT_ORDER,
  ORDER_ATTRIBUTES,
} from '../types/record'
import { ConfigurationError, isPlainObject } from '../utils/errors.js'

function objectAt(value: unknown, path: string): Record<string, unknown> {
  if (!isPlainObject(value)) {
    throw new ConfigurationError(`'${path}' must be an object`, path, { value })
  }
  return value
}

function stringAt(value: unknown, path: string, allowEmpty = false): string {
  if (typeof value !== 'string' || (!allowEmpty && value.length === 0)) {
    throw new ConfigurationError(`'${path}' must be a non-empty string`, path, { value })
  }
  return value
}

function positiveNumberAt(value: unknown, path: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`'${path}' must be a positive number`, path, { value })
  }
  return value
}

function positiveIntegerAt(value: unknown, path: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`'${path}' must be a positive integer`, path, { value })
  }
  return value
}

function arrayAt(value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new ConfigurationError(`'${path}' must be an array`, path, { value })
  }
  return value
}

function oneOfAt<T>(value: unknown, allowed: readonly T[], path: string): T {
  const match = allowed.find((option) => option === value)
  if (match === undefined) {
    throw new ConfigurationError(
      `'${path}' must be one of: ${allowed.join(', ')}`,
      path,
      { value },
    )
  }
  return match
}

function validateOrderFieldRules(value: unknown): OrderFieldRules {
  const rules: Record<string, Record<string, OrderAttribute>> = {}
  for (const [tag, codes] of Object.entries(objectAt(value, 'orderFieldRules'))) {
    const mapping: Record<string, OrderAttribute> = {}
    for (const [code, attribute] of Object.entries(objectAt(codes, `orderFieldRules.${tag}`))) {
      mapping[code] = oneOfAt(attribute, ORDER_ATTRIBUTES, `orderFieldRules.${tag}.${code}`)
    }
    rules[tag] = mapping
  }
  return rules
}

function validateMatchpoints(value: unknown, path: string): Matchpoints {
  const raw = objectAt(value, path)
  const matchpoints: Partial<Record<MatchpointPriority, IdentifierKind>> = {}
  for (const [priority, kind] of Object.entries(raw)) {
    const slot = oneOfAt(priority, MATCHPOINT_ORDER, `${path}.${priority}`)
    matchpoints[slot] = oneOfAt(kind, IDENTIFIER_KINDS, `${path}.${priority}`)
  }
  return matchpoints
}

function validateSignature(value: unknown, path: string): VendorSignature {
  const signature: Record<string, { code: string; value: string }> = {}
  for (const [tag, expected] of Object.entries(objectAt(value, path))) {
    const entry = objectAt(expected, `${path}.${tag}`)
    signature[tag] = {
      code: stringAt(entry.code, `${path}.${tag}.code`),
      value: stringAt(entry.value, `${path}.${tag}.value`),
    }
  }
  return signature
}

function validateBibField(value: unknown, path: string): VendorBibField {
  const field = objectAt(value, path)
  return {
    tag: stringAt(field.tag, `${path}.tag`),
    ind1: stringAt(field.ind1, `${path}.ind1`, true),
    ind2: stringAt(field.ind2, `${path}.ind2`, true),
    subfieldCode: stringAt(field.subfieldCode, `${path}.subfieldCode`),
    value: stringAt(field.value, `${path}.value`),
  }
}

function validateVendor(value: unknown, path: string): VendorRule {
  const vendor = objectAt(value, path)
  return {
    name: stringAt(vendor.name, `${path}.name`),
    primary: validateSignature(vendor.primary ?? {}, `${path}.primary`),
    alternate:
      vendor.alternate === undefined
        ? undefined
        : validateSignature(vendor.alternate, `${path}.alternate`),
    bibFields: arrayAt(vendor.bibFields ?? [], `${path}.bibFields`).map((field, index) =>
      validateBibField(field, `${path}.bibFields[${index}]`),
    ),
    matchpoints: validateMatchpoints(vendor.matchpoints, `${path}.matchpoints`),
  }
}

function validateItemField(value: unknown, path: string): ItemFieldPattern {
  const pattern = objectAt(value, path)
  return {
    tag: stringAt(pattern.tag, `${path}.tag`),
    ind1: stringAt(pattern.ind1, `${path}.ind1`),
    ind2: stringAt(pattern.ind2, `${path}.ind2`),
  }
}

function validateExternalItemSource(value: unknown, path: string): ExternalItemSource {
  const source = objectAt(value, path)
  return {
    tag: stringAt(source.tag, `${path}.tag`),
    code: stringAt(source.code, `${path}.code`),
    value: stringAt(source.value, `${path}.value`),
    itemField: validateItemField(source.itemField, `${path}.itemField`),
  }
}

function validateLibrary(value: unknown, library: LibrarySystem): LibraryRules {
  const path = `libraries.${library}`
  const rules = objectAt(value, path)

  const vendors = arrayAt(rules.vendors, `${path}.vendors`).map((vendor, index) =>
    validateVendor(vendor, `${path}.vendors[${index}]`),
  )
  if (!vendors.some((vendor) => vendor.name === 'UNKNOWN')) {
    throw new ConfigurationError(
      `'${path}.vendors' must contain an UNKNOWN entry`,
      `${path}.vendors`,
    )
  }

  const defaultLocations: Partial<Record<Collection, string>> = {}
  for (const [collection, location] of Object.entries(
    objectAt(rules.defaultLocations ?? {}, `${path}.defaultLocations`),
  )) {
    const key = oneOfAt(collection, COLLECTIONS, `${path}.defaultLocations.${collection}`)
    defaultLocations[key] = stringAt(location, `${path}.defaultLocations.${collection}`)
  }

  return {
    bibIdTag: stringAt(rules.bibIdTag, `${path}.bibIdTag`),
    callNumberTag: stringAt(rules.callNumberTag, `${path}.callNumberTag`),
    itemField: validateItemField(rules.itemField, `${path}.itemField`),
    externalItemSource:
      rules.externalItemSource === undefined
        ? undefined
        : validateExternalItemSource(rules.externalItemSource, `${path}.externalItemSource`),
    vendors,
    defaultLocations,
  }
}

/**
 * Validates an untyped configuration object and returns it typed.
 *
 * @throws {ConfigurationError} naming the first offending field
 */
export function validateEngineConfig(value: unknown): EngineConfig {
  const raw = objectAt(value, 'config')
  const libraries = objectAt(raw.libraries, 'libraries')

  return {
    libraries: {
      nypl: validateLibrary(libraries.nypl, 'nypl'),
      bpl: validateLibrary(libraries.bpl, 'bpl'),
    },
    orderFieldRules: validateOrderFieldRules(raw.orderFieldRules),
    collectionTag: stringAt(raw.collectionTag, 'collectionTag'),
    commandTag: stringAt(raw.commandTag, 'commandTag'),
    callNumberVendor: stringAt(raw.callNumberVendor, 'callNumberVendor'),
    attachOnNoMatchVendors: arrayAt(raw.attachOnNoMatchVendors ?? [], 'attachOnNoMatchVendors').map(
      (vendor, index) => stringAt(vendor, `attachOnNoMatchVendors[${index}]`),
    ),
    lookupTimeoutMs: positiveNumberAt(raw.lookupTimeoutMs, 'lookupTimeoutMs'),
    concurrency: positiveIntegerAt(raw.concurrency, 'concurrency'),
  }
}
