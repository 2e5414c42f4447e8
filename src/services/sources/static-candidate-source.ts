/**
 * Static Candidate Source
 * In-process source with canned candidates, for tests and local runs
 * @module services/sources/static-candidate-source
 */

import type { Candidate } from '../../types/candidate'
import type { IdentifierKind } from '../../types/record'
import { LookupNetworkError, LookupServerError } from '../lookup-error.js'
import type { CandidateSource } from './candidate-source.js'

/**
 * Configuration for the static source
 */
export interface StaticSourceConfig {
  /** Source name */
  name?: string

  /** Canned candidates per identifier */
  entries?: readonly StaticSourceEntry[]

  /** Simulated latency in milliseconds */
  latencyMs?: number

  /** Fail every call with this kind of error */
  failureError?: 'network' | 'server'
}

export interface StaticSourceEntry {
  kind: IdentifierKind
  value: string
  candidates: readonly Candidate[]
}

/**
 * Call history entry
 */
export interface StaticSourceCall {
  kind: IdentifierKind
  value: string
  timestamp: Date
  /** Number of candidates returned, absent for failed calls */
  returned?: number
  error?: string
}

export interface StaticCandidateSource extends CandidateSource {
  /** Add or replace the candidates for one identifier */
  addCandidates(kind: IdentifierKind, value: string, candidates: readonly Candidate[]): void

  getCallHistory(): StaticSourceCall[]

  getCallCount(): number

  clearCallHistory(): void
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

function entryKey(kind: IdentifierKind, value: string): string {
  return `${kind}\u0000${value}`
}

/**
 * Create a static candidate source
 *
 * @example
 * ```typescript
 * const source = createStaticCandidateSource({
 *   entries: [{ kind: 'isbn', value: '9780306406157', candidates: [candidate] }],
 * })
 *
 * await source.getCandidates('isbn', '9780306406157') // [candidate]
 * source.getCallCount() // 1
 * ```
 */
export function createStaticCandidateSource(config: StaticSourceConfig = {}): StaticCandidateSource {
  const name = config.name ?? 'static-source'
  const candidatesByKey = new Map<string, readonly Candidate[]>()
  const callHistory: StaticSourceCall[] = []

  for (const entry of config.entries ?? []) {
    candidatesByKey.set(entryKey(entry.kind, entry.value), entry.candidates)
  }

  const failure = (): Error | null => {
    switch (config.failureError) {
      case 'network':
        return new LookupNetworkError(name, 'Simulated network failure')
      case 'server':
        return new LookupServerError(name, 503, 'Simulated server error')
      default:
        return null
    }
  }

  return {
    name,

    async getCandidates(kind: IdentifierKind, value: string): Promise<Candidate[]> {
      const timestamp = new Date()
      if (config.latencyMs && config.latencyMs > 0) {
        await sleep(config.latencyMs)
      }

      const error = failure()
      if (error) {
        callHistory.push({ kind, value, timestamp, error: error.message })
        throw error
      }

      const candidates = [...(candidatesByKey.get(entryKey(kind, value)) ?? [])]
      callHistory.push({ kind, value, timestamp, returned: candidates.length })
      return candidates
    },

    addCandidates(kind: IdentifierKind, value: string, candidates: readonly Candidate[]): void {
      candidatesByKey.set(entryKey(kind, value), candidates)
    },

    getCallHistory(): StaticSourceCall[] {
      return [...callHistory]
    },

    getCallCount(): number {
      return callHistory.length
    },

    clearCallHistory(): void {
      callHistory.length = 0
    },
  }
}
