import { describe, it, expect } from 'vitest'
import { BibMatcher, resolveMatchpoints } from '../../../src/core/matching/matcher'
import { LookupNetworkError, LookupTimeoutError } from '../../../src/services/lookup-error'
import { createStaticCandidateSource } from '../../../src/services/sources/static-candidate-source'
import {
  InvalidParameterError,
  MatchpointsMissingError,
  VendorInfoMissingError,
} from '../../../src/utils/errors'
import { createBibRecord, createCandidate } from '../../fixtures/records'

describe('resolveMatchpoints', () => {
  it("should use the vendor's matchpoints for cataloging", () => {
    expect(resolveMatchpoints(createBibRecord(), { primary: 'upc' })).toEqual({
      primary: 'oclcNumber',
      secondary: 'isbn',
    })
  })

  it('should reject cataloging records without vendor information', () => {
    const record = createBibRecord({ vendorInfo: null, controlNumber: 'ocm1' })
    expect(() => resolveMatchpoints(record)).toThrow(VendorInfoMissingError)
  })

  it('should use the batch matchpoints outside cataloging', () => {
    const record = createBibRecord({ workflow: 'acq', vendorInfo: null })
    expect(resolveMatchpoints(record, { primary: 'isbn' })).toEqual({ primary: 'isbn' })
  })

  it('should reject acquisitions without matchpoints', () => {
    const record = createBibRecord({ workflow: 'acq', vendorInfo: null })
    expect(() => resolveMatchpoints(record)).toThrow(MatchpointsMissingError)
    expect(() => resolveMatchpoints(record, {})).toThrow(MatchpointsMissingError)
  })
})

describe('BibMatcher', () => {
  it('should return the first matchpoint with candidates', async () => {
    const candidate = createCandidate({ bibId: '.b1' })
    const source = createStaticCandidateSource({
      entries: [{ kind: 'isbn', value: '9780306406157', candidates: [candidate] }],
    })
    const matcher = new BibMatcher({ source, timeoutMs: 1000 })
    const record = createBibRecord({ oclcNumbers: ['123'], isbn: '9780306406157' })

    const candidates = await matcher.match(record, { primary: 'oclcNumber', secondary: 'isbn' })

    expect(candidates).toEqual([candidate])
    expect(source.getCallHistory().map((call) => [call.kind, call.value])).toEqual([
      ['oclcNumber', '123'],
      ['isbn', '9780306406157'],
    ])
  })

  it('should skip matchpoints without a value', async () => {
    const candidate = createCandidate({ bibId: '.b2' })
    const source = createStaticCandidateSource({
      entries: [{ kind: 'upc', value: '024543602965', candidates: [candidate] }],
    })
    const matcher = new BibMatcher({ source, timeoutMs: 1000 })
    const record = createBibRecord({ upc: '024543602965' })

    const candidates = await matcher.match(record, {
      primary: 'bibId',
      secondary: 'isbn',
      tertiary: 'upc',
    })

    expect(candidates).toEqual([candidate])
    expect(source.getCallCount()).toBe(1)
  })

  it('should iterate by priority rather than key order', async () => {
    const source = createStaticCandidateSource()
    const matcher = new BibMatcher({ source, timeoutMs: 1000 })
    const record = createBibRecord({ isbn: '123X', oclcNumbers: ['55'] })

    await matcher.match(record, { secondary: 'oclcNumber', primary: 'isbn' })

    expect(source.getCallHistory().map((call) => call.kind)).toEqual(['isbn', 'oclcNumber'])
  })

  it('should send normalized values', async () => {
    const source = createStaticCandidateSource()
    const matcher = new BibMatcher({ source, timeoutMs: 1000 })
    const record = createBibRecord({ bibId: '12345' })

    await matcher.match(record, { primary: 'bibId' })

    expect(source.getCallHistory()[0].value).toBe('.b12345')
  })

  it('should return no candidates when nothing matches', async () => {
    const source = createStaticCandidateSource()
    const matcher = new BibMatcher({ source, timeoutMs: 1000 })
    const record = createBibRecord({ isbn: '9780306406157', oclcNumbers: ['1'] })

    expect(await matcher.match(record, { primary: 'oclcNumber', secondary: 'isbn' })).toEqual([])
    expect(source.getCallCount()).toBe(2)
  })

  it('should propagate lookup failures', async () => {
    const source = createStaticCandidateSource({ failureError: 'network' })
    const matcher = new BibMatcher({ source, timeoutMs: 1000 })
    const record = createBibRecord({ isbn: '9780306406157' })

    await expect(matcher.match(record, { primary: 'isbn' })).rejects.toThrow(LookupNetworkError)
  })

  it('should raise a timeout rather than report no candidates', async () => {
    const source = createStaticCandidateSource({ latencyMs: 50 })
    const matcher = new BibMatcher({ source, timeoutMs: 5 })
    const record = createBibRecord({ isbn: '9780306406157' })

    await expect(matcher.match(record, { primary: 'isbn' })).rejects.toThrow(LookupTimeoutError)
  })

  it('should require a positive timeout', () => {
    expect(() => new BibMatcher({ source: createStaticCandidateSource(), timeoutMs: 0 })).toThrow(
      InvalidParameterError,
    )
  })
})
