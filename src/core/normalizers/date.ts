/**
 * Timestamp parsing for record and candidate update dates. All timestamps
 * are read as UTC.
 */

const MARC_TIMESTAMP = /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})(?:\.\d+)?$/
const ISO_TIMESTAMP = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2}):(\d{2})/

function fromParts(parts: readonly string[]): Date | null {
  const [year, month, day, hour, minute, second] = parts.map((part) => Number(part))
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second))
  // rejects rolled-over values such as month 13
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null
  }
  return date
}

/**
 * Parses a MARC 005 timestamp (`YYYYMMDDHHMMSS.f`).
 *
 * @example
 * ```typescript
 * parseMarcTimestamp('20240115093000.0') // 2024-01-15T09:30:00.000Z
 * parseMarcTimestamp('2024') // null
 * ```
 */
export function parseMarcTimestamp(value: string | null | undefined): Date | null {
  if (!value) return null
  const match = MARC_TIMESTAMP.exec(value.trim())
  return match ? fromParts(match.slice(1)) : null
}

/**
 * Parses an ISO-like timestamp (`YYYY-MM-DDTHH:MM:SS`), ignoring any fraction or offset.
 */
export function parseIsoTimestamp(value: string | null | undefined): Date | null {
  if (!value) return null
  const match = ISO_TIMESTAMP.exec(value.trim())
  return match ? fromParts(match.slice(1)) : null
}

/**
 * Parses either timestamp form; unparsable values are treated as absent.
 */
export function parseTimestamp(value: string | null | undefined): Date | null {
  return parseMarcTimestamp(value) ?? parseIsoTimestamp(value)
}
