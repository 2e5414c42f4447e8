/**
 * Shared request handling for HTTP-backed candidate sources
 */

import type { Logger } from '../logger.js'
import { LookupNetworkError, LookupServerError } from '../lookup-error.js'

export type FetchFunction = (input: string, init?: RequestInit) => Promise<Response>

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Issues a GET request and returns the decoded JSON body, or `null` when the
 * status is listed in `emptyStatuses`.
 *
 * @throws {LookupNetworkError} If the request cannot be sent
 * @throws {LookupServerError} On any other non-2xx status or an undecodable body
 */
export async function getJson(
  sourceName: string,
  fetchFn: FetchFunction,
  url: string,
  headers: Record<string, string>,
  logger: Logger,
  emptyStatuses: readonly number[] = [],
): Promise<unknown> {
  let response: Response
  try {
    response = await fetchFn(url, { method: 'GET', headers })
  } catch (error) {
    throw new LookupNetworkError(sourceName, describe(error), error, { url })
  }

  logger.debug(`Response code ${response.status}`, { url })

  if (emptyStatuses.includes(response.status)) {
    return null
  }
  if (!response.ok) {
    throw new LookupServerError(sourceName, response.status, response.statusText, { url })
  }

  try {
    const body: unknown = await response.json()
    return body
  } catch (error) {
    throw new LookupServerError(sourceName, response.status, `Invalid JSON body: ${describe(error)}`, { url })
  }
}
