import { describe, it, expect } from 'vitest'
import { determineCatalogAction, sameBranchCallNumber } from '../../../src/core/analysis/analyzer'
import { AcquisitionsAnalyzer } from '../../../src/core/analysis/analyzers/acquisitions'
import { BplCatalogingAnalyzer } from '../../../src/core/analysis/analyzers/bpl-cataloging'
import { NyplBranchAnalyzer } from '../../../src/core/analysis/analyzers/nypl-branch'
import { NyplResearchAnalyzer } from '../../../src/core/analysis/analyzers/nypl-research'
import { SelectionAnalyzer } from '../../../src/core/analysis/analyzers/selection'
import { classifyCandidates } from '../../../src/core/matching/candidate-classifier'
import type { BibRecord, Candidate } from '../../../src'
import {
  createBibRecord,
  createCandidate,
  NEWER,
  OLDER,
  testConfig,
  vendorInfoFor,
} from '../../fixtures/records'

const classify = (record: BibRecord, candidates: Candidate[]) =>
  classifyCandidates(record, candidates)

describe('determineCatalogAction', () => {
  const record = { updateDate: new Date('2024-03-01T00:00:00Z') }

  it('should attach to in-house records whatever their date', () => {
    expect(determineCatalogAction(record, { catSource: 'inhouse', updateDate: NEWER })).toEqual({
      action: 'attach',
      updatedByVendor: false,
    })
  })

  it('should overlay newer vendor records', () => {
    expect(determineCatalogAction(record, { catSource: 'vendor', updateDate: NEWER })).toEqual({
      action: 'overlay',
      updatedByVendor: true,
    })
  })

  it('should attach to older or undated vendor records', () => {
    expect(determineCatalogAction(record, { catSource: 'vendor', updateDate: OLDER }).action).toBe(
      'attach',
    )
    expect(determineCatalogAction(record, { catSource: 'vendor', updateDate: null }).action).toBe(
      'attach',
    )
  })

  it('should overlay when the record has no date', () => {
    expect(
      determineCatalogAction({ updateDate: null }, { catSource: 'vendor', updateDate: OLDER }),
    ).toEqual({ action: 'overlay', updatedByVendor: true })
  })
})

describe('NyplBranchAnalyzer', () => {
  const analyzer = new NyplBranchAnalyzer()

  it('should insert without matches', () => {
    const record = createBibRecord({ branchCallNumber: ['FIC SMITH'] })
    const analysis = analyzer.analyze(record, classify(record, []))

    expect(analysis.decision).toEqual({ action: 'insert', targetId: null, updatedByVendor: false })
    expect(analysis.callNumberMatch).toBe(true)
    expect(analysis.inputCallNumber).toBe('FIC SMITH')
    expect(analysis.targetCallNumber).toBeNull()
  })

  it('should prefer the first candidate with the same call number', () => {
    const record = createBibRecord({ branchCallNumber: ['FIC SMITH'] })
    const analysis = analyzer.analyze(
      record,
      classify(record, [
        createCandidate({ bibId: '.b1', branchCallNumber: 'FIC JONES', updateDate: OLDER }),
        createCandidate({ bibId: '.b2', branchCallNumber: 'FIC SMITH', updateDate: OLDER }),
        createCandidate({ bibId: '.b3', branchCallNumber: 'FIC SMITH', updateDate: OLDER }),
      ]),
    )

    expect(analysis.decision).toEqual({ action: 'attach', targetId: '.b2', updatedByVendor: false })
    expect(analysis.callNumberMatch).toBe(true)
    expect(analysis.targetCallNumber).toBe('FIC SMITH')
    expect(analysis.duplicates).toEqual(['.b1', '.b2', '.b3'])
  })

  it('should fall back to the highest id when no call number agrees', () => {
    const record = createBibRecord({ branchCallNumber: ['FIC SMITH'] })
    const analysis = analyzer.analyze(
      record,
      classify(record, [
        createCandidate({ bibId: '.b9', branchCallNumber: 'FIC JONES', updateDate: NEWER }),
        createCandidate({ bibId: '.b5', branchCallNumber: null, catSource: 'inhouse' }),
      ]),
    )

    expect(analysis.decision).toEqual({ action: 'overlay', targetId: '.b9', updatedByVendor: true })
    expect(analysis.callNumberMatch).toBe(false)
    expect(analysis.targetCallNumber).toBe('FIC JONES')
  })

  it('should not count two absent call numbers as agreement', () => {
    const record = createBibRecord({ branchCallNumber: [] })
    const analysis = analyzer.analyze(record, classify(record, [createCandidate({ bibId: '.b1' })]))
    expect(analysis.callNumberMatch).toBe(false)
  })

  it('should not agree when the record carries more than one call number', () => {
    const record = createBibRecord({ branchCallNumber: ['FIC SMITH', 'FIC JONES'] })
    const analysis = analyzer.analyze(
      record,
      classify(record, [
        createCandidate({ bibId: '.b1', branchCallNumber: 'FIC SMITH', updateDate: OLDER }),
        createCandidate({ bibId: '.b2', branchCallNumber: 'FIC ADAMS', updateDate: OLDER }),
      ]),
    )

    expect(analysis.decision.targetId).toBe('.b2')
    expect(analysis.callNumberMatch).toBe(false)
  })
})

describe('sameBranchCallNumber', () => {
  it('should compare the whole call number list with the candidate call number', () => {
    const candidate = createCandidate({ branchCallNumber: 'FIC SMITH' })
    expect(sameBranchCallNumber(createBibRecord({ branchCallNumber: ['FIC SMITH'] }), candidate)).toBe(true)
    expect(
      sameBranchCallNumber(createBibRecord({ branchCallNumber: ['FIC SMITH', 'FIC SMITH'] }), candidate),
    ).toBe(false)
    expect(sameBranchCallNumber(createBibRecord({ branchCallNumber: [] }), candidate)).toBe(false)
  })
})

describe('NyplResearchAnalyzer', () => {
  const analyzer = new NyplResearchAnalyzer()

  it('should accept the first candidate with any research call number', () => {
    const record = createBibRecord({ collection: 'RL', researchCallNumber: ['ReCAP 1'] })
    const analysis = analyzer.analyze(
      record,
      classify(record, [
        createCandidate({ bibId: '.b8', collection: 'RL', researchCallNumber: ['JFE 99-1'] }),
        createCandidate({ bibId: '.b3', collection: 'RL' }),
        createCandidate({
          bibId: '.b6',
          collection: 'RL',
          researchCallNumber: ['ReCAP 2', 'ReCAP 3'],
          catSource: 'inhouse',
        }),
      ]),
    )

    expect(analysis.decision).toEqual({ action: 'attach', targetId: '.b6', updatedByVendor: false })
    expect(analysis.callNumberMatch).toBe(true)
    expect(analysis.inputCallNumber).toBe('ReCAP 1')
    expect(analysis.targetCallNumber).toBe('ReCAP 2')
  })

  it('should apply the recency rule to the fallback', () => {
    const record = createBibRecord({ collection: 'RL', updateDate: new Date('2024-03-01T00:00:00Z') })
    const olderFallback = analyzer.analyze(
      record,
      classify(record, [
        createCandidate({ bibId: '.b1', collection: 'RL', updateDate: NEWER }),
        createCandidate({ bibId: '.b2', collection: 'RL', updateDate: OLDER }),
      ]),
    )

    expect(olderFallback.decision).toEqual({
      action: 'attach',
      targetId: '.b2',
      updatedByVendor: false,
    })
    expect(olderFallback.callNumberMatch).toBe(false)
    expect(olderFallback.targetCallNumber).toBeNull()
  })

  it('should report mixed and other candidates', () => {
    const record = createBibRecord({ collection: 'RL' })
    const analysis = analyzer.analyze(
      record,
      classify(record, [
        createCandidate({ bibId: '.b1', collection: 'MIXED' }),
        createCandidate({ bibId: '.b2', collection: 'BL' }),
      ]),
    )
    expect(analysis.decision.action).toBe('insert')
    expect(analysis.mixed).toEqual(['.b1'])
    expect(analysis.other).toEqual(['.b2'])
  })
})

describe('BplCatalogingAnalyzer', () => {
  const analyzer = new BplCatalogingAnalyzer(testConfig.attachOnNoMatchVendors)
  const bplRecord = (overrides: Partial<BibRecord> = {}): BibRecord =>
    createBibRecord({
      library: 'bpl',
      collection: 'NONE',
      vendor: 'BT ROMU',
      vendorInfo: vendorInfoFor('bpl', 'BT ROMU'),
      branchCallNumber: ['FIC SMITH'],
      updateDate: new Date('2024-03-01T00:00:00Z'),
      ...overrides,
    })

  it('should attach to an older vendor record with the same call number', () => {
    const record = bplRecord()
    const analysis = analyzer.analyze(
      record,
      classify(record, [
        createCandidate({
          bibId: '.b11',
          collection: null,
          branchCallNumber: 'FIC SMITH',
          updateDate: OLDER,
        }),
      ]),
    )

    expect(analysis.decision).toEqual({ action: 'attach', targetId: '.b11', updatedByVendor: false })
    expect(analysis.callNumberMatch).toBe(true)
  })

  it('should overlay a newer vendor record with the same call number', () => {
    const record = bplRecord()
    const analysis = analyzer.analyze(
      record,
      classify(record, [
        createCandidate({
          bibId: '.b11',
          collection: null,
          branchCallNumber: 'FIC SMITH',
          updateDate: NEWER,
        }),
      ]),
    )

    expect(analysis.decision).toEqual({ action: 'overlay', targetId: '.b11', updatedByVendor: true })
    expect(analysis.callNumberMatch).toBe(true)
  })

  it('should attach Midwest records without matches', () => {
    const record = bplRecord({
      vendor: 'Midwest DVD',
      vendorInfo: vendorInfoFor('bpl', 'Midwest DVD'),
      bibId: '.b77',
    })
    const analysis = analyzer.analyze(record, classify(record, []))

    expect(analysis.decision).toEqual({ action: 'attach', targetId: '.b77', updatedByVendor: false })
    expect(analysis.targetCallNumber).toBe('FIC SMITH')
    expect(analysis.targetTitle).toBe('Test title')
  })

  it('should insert other vendors without matches', () => {
    const record = bplRecord()
    const analysis = analyzer.analyze(record, classify(record, []))
    expect(analysis.decision).toEqual({ action: 'insert', targetId: null, updatedByVendor: false })
  })

  it('should fall back to the last match by id', () => {
    const record = bplRecord()
    const analysis = analyzer.analyze(
      record,
      classify(record, [
        createCandidate({ bibId: '.b200', collection: null, branchCallNumber: 'FIC JONES', catSource: 'inhouse' }),
        createCandidate({ bibId: '.b30', collection: null, branchCallNumber: null }),
      ]),
    )
    expect(analysis.decision).toEqual({ action: 'attach', targetId: '.b200', updatedByVendor: false })
    expect(analysis.callNumberMatch).toBe(false)
  })
})

describe('SelectionAnalyzer', () => {
  const analyzer = new SelectionAnalyzer()

  it('should insert without candidates', () => {
    const record = createBibRecord({ workflow: 'sel', vendorInfo: null })
    const analysis = analyzer.analyze(record, classify(record, []))
    expect(analysis.decision).toEqual({ action: 'insert', targetId: null, updatedByVendor: false })
    expect(analysis.callNumberMatch).toBe(true)
  })

  it('should attach to the first match holding a call number', () => {
    const record = createBibRecord({ workflow: 'sel', vendorInfo: null })
    const analysis = analyzer.analyze(
      record,
      classify(record, [
        createCandidate({ bibId: '.b1' }),
        createCandidate({ bibId: '.b2', branchCallNumber: 'J FIC DOE', updateDate: NEWER }),
        createCandidate({ bibId: '.b3', branchCallNumber: 'FIC DOE' }),
      ]),
    )
    expect(analysis.decision).toEqual({ action: 'attach', targetId: '.b2', updatedByVendor: false })
    expect(analysis.callNumberMatch).toBe(true)
    expect(analysis.targetCallNumber).toBe('J FIC DOE')
  })

  it('should attach to the highest id when no match has a call number', () => {
    const record = createBibRecord({ workflow: 'sel', vendorInfo: null })
    const analysis = analyzer.analyze(
      record,
      classify(record, [createCandidate({ bibId: '.b12' }), createCandidate({ bibId: '.b3' })]),
    )
    expect(analysis.decision.targetId).toBe('.b12')
  })
})

describe('AcquisitionsAnalyzer', () => {
  const analyzer = new AcquisitionsAnalyzer()

  it('should insert under the record bib id without matches', () => {
    const record = createBibRecord({ workflow: 'acq', vendorInfo: null })
    const analysis = analyzer.analyze(record, classify(record, []))
    expect(analysis.decision).toEqual({ action: 'insert', targetId: null, updatedByVendor: false })
    expect(analysis.callNumberMatch).toBe(true)
  })

  it('should insert even when candidates match', () => {
    const record = createBibRecord({ workflow: 'acq', vendorInfo: null, bibId: '.b42' })
    const analysis = analyzer.analyze(
      record,
      classify(record, [createCandidate({ bibId: '.b1' }), createCandidate({ bibId: '.b2' })]),
    )
    expect(analysis.decision).toEqual({ action: 'insert', targetId: '.b42', updatedByVendor: false })
    expect(analysis.duplicates).toEqual(['.b1', '.b2'])
  })
})
