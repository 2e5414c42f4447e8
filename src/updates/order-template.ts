/**
 * Order template overlay and order-to-field mapping
 * @module updates/order-template
 */

import type { OrderFieldRules } from '../types/config'
import type { FieldEdit, Subfield } from '../types/marc'
import type { OrderAttribute, OrderLine, OrderTemplate, OrderValue } from '../types/record'
import { ORDER_ATTRIBUTES } from '../types/record'

/**
 * Whether a template value carries data: null, empty strings, zero and
 * empty lists do not.
 */
export function hasValue(value: OrderValue | undefined): boolean {
  if (value === null || value === undefined) return false
  if (typeof value === 'string') return value.length > 0
  if (typeof value === 'number') return value !== 0 && !Number.isNaN(value)
  return value.length > 0
}

function asOrderAttribute(key: string): OrderAttribute | undefined {
  return ORDER_ATTRIBUTES.find((attribute) => attribute === key)
}

/**
 * Overlays template values onto an order line. Only keys naming an order
 * attribute and carrying a value overwrite; everything else is kept.
 * Applying the same template twice gives the same line as applying it once.
 *
 * @example
 * ```typescript
 * applyOrderTemplate({ fund: 'adult', copies: '1' }, { fund: 'teen', copies: '', vendor: 'ACME' })
 * // { fund: 'teen', copies: '1' }
 * ```
 */
export function applyOrderTemplate(order: OrderLine, template: OrderTemplate): OrderLine {
  const updated: Partial<Record<OrderAttribute, OrderValue>> = { ...order }
  for (const [key, value] of Object.entries(template)) {
    const attribute = asOrderAttribute(key)
    if (attribute && value !== undefined && hasValue(value)) {
      updated[attribute] = value
    }
  }
  return updated
}

function toSubfields(code: string, value: OrderValue | undefined): Subfield[] {
  if (value === null || value === undefined) return []
  if (typeof value === 'string' || typeof value === 'number') {
    return [{ code, value: String(value) }]
  }
  return value.map((entry) => ({ code, value: entry }))
}

/**
 * One field per order tag, subfields in rule-table order. Absent values are
 * skipped and list values give one subfield per entry; a tag left with no
 * subfields is not written.
 */
export function mapOrderToFields(order: OrderLine, rules: OrderFieldRules): FieldEdit[] {
  const edits: FieldEdit[] = []
  for (const [tag, mapping] of Object.entries(rules)) {
    const subfields = Object.entries(mapping).flatMap(([code, attribute]) =>
      toSubfields(code, order[attribute]),
    )
    if (subfields.length > 0) {
      edits.push({ tag, indicators: [' ', ' '], subfields, delete: false })
    }
  }
  return edits
}
