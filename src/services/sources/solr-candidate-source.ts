/**
 * Candidate source backed by the BPL Solr search service
 * @module services/sources/solr-candidate-source
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
import { parseSolrDoc } from './solr-response.js'

export interface SolrSourceOptions {
  /** Search endpoint, e.g. `https://solr.example.org/bibs` */
  endpoint: string
  /** Subscription key sent with every request */
  apiKey: string
  name?: string
  logger?: Logger
  fetch?: FetchFunction
}

const QUERY_FIELDS: Readonly<Record<IdentifierKind, string>> = {
  bibId: 'id',
  isbn: 'isbn',
  oclcNumber: 'ss_marc_tag_001',
  upc: 'sm_marc_tag_024_a',
}

const RESPONSE_FIELDS = [
  'id',
  'title',
  'call_number',
  'isbn',
  'sm_bib_varfields',
  'sm_item_data',
  'ss_marc_tag_001',
  'ss_marc_tag_003',
  'ss_marc_tag_005',
]

/**
 * Queries `GET {endpoint}/select` with a field query per identifier kind.
 */
export class SolrCandidateSource implements CandidateSource {
  readonly name: string
  private readonly endpoint: string
  private readonly apiKey: string
  private readonly logger: Logger
  private readonly fetchFn: FetchFunction

  constructor(options: SolrSourceOptions) {
    this.name = options.name ?? 'bpl-solr'
    this.endpoint = options.endpoint.replace(/\/+$/, '')
    this.apiKey = options.apiKey
    this.logger = createPrefixedLogger(this.name, options.logger ?? createSilentLogger())
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init))
  }

  async getCandidates(kind: IdentifierKind, value: string): Promise<Candidate[]> {
    const field = Object.hasOwn(QUERY_FIELDS, kind) ? QUERY_FIELDS[kind] : undefined
    if (!field) {
      throw new UnsupportedIdentifierError(this.name, kind)
    }

    const term = kind === 'bibId' ? value.replace(/^[.b]+/, '') : value
    const query = new URLSearchParams({
      q: `${field}:"${term.replace(/"/g, '\\"')}"`,
      fl: RESPONSE_FIELDS.join(','),
      rows: '25',
    })
    const body = await getJson(
      this.name,
      this.fetchFn,
      `${this.endpoint}/select?${query.toString()}`,
      { 'Ocp-Apim-Subscription-Key': this.apiKey, Accept: 'application/json' },
      this.logger,
    )
    if (!isPlainObject(body) || !isPlainObject(body.response)) return []

    return objectArrayField(body.response, 'docs')
      .map(parseSolrDoc)
      .filter((candidate): candidate is Candidate => candidate !== null)
  }
}
