import { describe, it, expect } from 'vitest'
import {
  bibIdNumber,
  IDENTIFIER_NORMALIZERS,
  normalizeBibId,
  normalizeIsbn,
  normalizeOclcNumber,
  normalizeUpc,
} from '../../../src/core/normalizers/identifier'

describe('normalizeIsbn', () => {
  it('should keep digits only', () => {
    expect(normalizeIsbn('978-0-306-40615-7')).toBe('9780306406157')
  })

  it('should drop qualifiers after the number', () => {
    expect(normalizeIsbn('9780306406157 (pbk.)')).toBe('9780306406157')
  })

  it('should uppercase a trailing check character', () => {
    expect(normalizeIsbn('0306406152x')).toBe('030640615X')
  })

  it('should return null for empty values', () => {
    expect(normalizeIsbn(null)).toBeNull()
    expect(normalizeIsbn('   ')).toBeNull()
    expect(normalizeIsbn('(pbk.)')).toBeNull()
  })
})

describe('normalizeOclcNumber', () => {
  it('should strip the prefixes', () => {
    expect(normalizeOclcNumber('(OCoLC)ocm00012345')).toBe('00012345')
    expect(normalizeOclcNumber('ocn123456789')).toBe('123456789')
    expect(normalizeOclcNumber('on1234567890')).toBe('1234567890')
  })

  it('should leave bare numbers unchanged', () => {
    expect(normalizeOclcNumber('987654')).toBe('987654')
  })

  it('should stringify numbers', () => {
    expect(normalizeOclcNumber(42)).toBe('42')
  })
})

describe('normalizeBibId', () => {
  it('should write exactly one .b prefix', () => {
    expect(normalizeBibId('12345678')).toBe('.b12345678')
    expect(normalizeBibId('.b12345678')).toBe('.b12345678')
    expect(normalizeBibId('b12345678')).toBe('.b12345678')
  })

  it('should return null without an id', () => {
    expect(normalizeBibId('.b')).toBeNull()
    expect(normalizeBibId(undefined)).toBeNull()
  })
})

describe('normalizeUpc', () => {
  it('should trim', () => {
    expect(normalizeUpc(' 024543602965 ')).toBe('024543602965')
  })
})

describe('bibIdNumber', () => {
  it('should read the numeric part after any prefix', () => {
    expect(bibIdNumber('.b30')).toBe(30)
    expect(bibIdNumber('b100')).toBe(100)
    expect(bibIdNumber('4')).toBe(4)
  })

  it('should sort ids without digits last', () => {
    expect(bibIdNumber('.b')).toBe(Number.POSITIVE_INFINITY)
  })
})

describe('IDENTIFIER_NORMALIZERS', () => {
  it('should cover every identifier kind', () => {
    expect(Object.keys(IDENTIFIER_NORMALIZERS).sort()).toEqual(['bibId', 'isbn', 'oclcNumber', 'upc'])
  })
})
