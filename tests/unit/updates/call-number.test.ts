import { describe, it, expect } from 'vitest'
import { parseCallNumber } from '../../../src/updates/call-number'
import { CallNumberIntegrityError } from '../../../src/utils/errors'

const join = (callNumber: string): string =>
  parseCallNumber(callNumber)
    .map((subfield) => subfield.value)
    .join(' ')

describe('parseCallNumber', () => {
  it('should split fiction', () => {
    expect(parseCallNumber('FIC SMITH')).toEqual([
      { code: 'a', value: 'FIC' },
      { code: 'c', value: 'SMITH' },
    ])
  })

  it('should split prefixed fiction', () => {
    expect(parseCallNumber('J SPA FIC GARCIA')).toEqual([
      { code: 'p', value: 'J SPA' },
      { code: 'a', value: 'FIC' },
      { code: 'c', value: 'GARCIA' },
    ])
  })

  it('should split graphic novels with a format', () => {
    expect(parseCallNumber('GRAPHIC GN FIC TANAKA')).toEqual([
      { code: 'f', value: 'GRAPHIC' },
      { code: 'a', value: 'GN FIC' },
      { code: 'c', value: 'TANAKA' },
    ])
  })

  it('should code juvenile easy books as E', () => {
    expect(parseCallNumber('J E BROWN')).toEqual([
      { code: 'p', value: 'J' },
      { code: 'a', value: 'E' },
      { code: 'c', value: 'BROWN' },
    ])
    expect(parseCallNumber('J SPA E LOPEZ')).toEqual([
      { code: 'p', value: 'J SPA' },
      { code: 'a', value: 'E' },
      { code: 'c', value: 'LOPEZ' },
    ])
  })

  it('should keep a call number without markers as the cutter', () => {
    expect(parseCallNumber('782.42 D')).toEqual([{ code: 'c', value: '782.42 D' }])
  })

  it('should rebuild every accepted call number exactly', () => {
    for (const callNumber of ['PIC WELLS', 'J FIC DOE', 'HOLIDAY PIC MOORE', 'J YR FIC ADAMS']) {
      expect(join(callNumber)).toBe(callNumber)
    }
  })

  it('should reject a call number it cannot rebuild', () => {
    expect(() => parseCallNumber('FIC YR SMITH')).toThrow(CallNumberIntegrityError)
    expect(() => parseCallNumber('FIC YR SMITH')).toThrow(
      "Constructed call number does not match original. New call number: 'YR FIC YR SMITH', Original call number: 'FIC YR SMITH'",
    )
  })
})
