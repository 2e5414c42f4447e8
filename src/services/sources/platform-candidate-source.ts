/**
 * Candidate source backed by the NYPL Platform bibs endpoint
 * @module services/sources/platform-candidate-source
 */

import type { Candidate } from '../../types/candidate'
import type { IdentifierKind } from '../../types/record'
import { isPlainObject } from '../../utils/errors.js'
import type { Logger } from '../logger.js'
import { createPrefixedLogger, createSilentLogger } from '../logger.js'
import { UnsupportedIdentifierError } from '../lookup-error.js'
import type { CandidateSource } from './candidate-source.js'
import type { FetchFunction } from './http.js'
import { getJson } from './http.js'
import { objectArrayField } from './json-fields.js'
import { parsePlatformBib } from './platform-response.js'

export interface PlatformSourceOptions {
  /** API root, e.g. `https://platform.example.org/api/v0.1` */
  baseUrl: string
  /** OAuth bearer token */
  accessToken: string
  name?: string
  logger?: Logger
  /** Defaults to the global fetch */
  fetch?: FetchFunction
}

const QUERY_PARAMETERS: Readonly<Record<IdentifierKind, string>> = {
  bibId: 'id',
  isbn: 'standardNumber',
  oclcNumber: 'controlNumber',
  upc: 'standardNumber',
}

/**
 * Queries `GET {baseUrl}/bibs` by id, standard number or control number.
 * A 404 answer means the catalog has no candidates.
 */
export class PlatformCandidateSource implements CandidateSource {
  readonly name: string
  private readonly baseUrl: string
  private readonly accessToken: string
  private readonly logger: Logger
  private readonly fetchFn: FetchFunction

  constructor(options: PlatformSourceOptions) {
    this.name = options.name ?? 'nypl-platform'
    this.baseUrl = options.baseUrl.replace(/\/+$/, '')
    this.accessToken = options.accessToken
    this.logger = createPrefixedLogger(this.name, options.logger ?? createSilentLogger())
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init))
  }

  async getCandidates(kind: IdentifierKind, value: string): Promise<Candidate[]> {
    const parameter = Object.hasOwn(QUERY_PARAMETERS, kind) ? QUERY_PARAMETERS[kind] : undefined
    if (!parameter) {
      throw new UnsupportedIdentifierError(this.name, kind)
    }

    const query = new URLSearchParams({
      [parameter]: kind === 'bibId' ? value.replace(/^[.b]+/, '') : value,
      limit: '25',
      deleted: 'false',
    })
    const body = await getJson(
      this.name,
      this.fetchFn,
      `${this.baseUrl}/bibs?${query.toString()}`,
      { Authorization: `Bearer ${this.accessToken}`, Accept: 'application/json' },
      this.logger,
      [404],
    )
    if (!isPlainObject(body)) return []

    return objectArrayField(body, 'data')
      .map(parsePlatformBib)
      .filter((candidate): candidate is Candidate => candidate !== null)
  }
}
