import { describe, it, expect } from 'vitest'
import { LookupServerError } from '../../../src/services/lookup-error'
import { createStaticCandidateSource } from '../../../src/services/sources/static-candidate-source'
import { createCandidate } from '../../fixtures/records'

describe('createStaticCandidateSource', () => {
  it('should return canned candidates per identifier', async () => {
    const candidate = createCandidate()
    const source = createStaticCandidateSource({
      entries: [{ kind: 'isbn', value: '1', candidates: [candidate] }],
    })

    expect(await source.getCandidates('isbn', '1')).toEqual([candidate])
    expect(await source.getCandidates('upc', '1')).toEqual([])
  })

  it('should record calls', async () => {
    const source = createStaticCandidateSource({ name: 'canned' })
    source.addCandidates('oclcNumber', '9', [createCandidate()])

    await source.getCandidates('oclcNumber', '9')
    await source.getCandidates('isbn', '2')

    expect(source.name).toBe('canned')
    expect(source.getCallCount()).toBe(2)
    expect(source.getCallHistory().map((call) => call.returned)).toEqual([1, 0])

    source.clearCallHistory()
    expect(source.getCallCount()).toBe(0)
  })

  it('should simulate failures', async () => {
    const source = createStaticCandidateSource({ failureError: 'server' })

    await expect(source.getCandidates('isbn', '1')).rejects.toThrow(LookupServerError)
    expect(source.getCallHistory()[0].error).toBe(
      "Server error in 'static-source' (HTTP 503): Simulated server error",
    )
  })
})
