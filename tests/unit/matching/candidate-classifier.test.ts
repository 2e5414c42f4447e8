import { describe, it, expect } from 'vitest'
import { classifyCandidates } from '../../../src/core/matching/candidate-classifier'
import { createCandidate } from '../../fixtures/records'

describe('classifyCandidates', () => {
  it('should order matches by numeric catalog id', () => {
    const classified = classifyCandidates({ library: 'nypl', collection: 'BL' }, [
      createCandidate({ bibId: '.b30' }),
      createCandidate({ bibId: '.b4' }),
      createCandidate({ bibId: '.b100' }),
    ])
    expect(classified.matched.map((candidate) => candidate.bibId)).toEqual(['.b4', '.b30', '.b100'])
  })

  it('should partition by collection', () => {
    const classified = classifyCandidates({ library: 'nypl', collection: 'BL' }, [
      createCandidate({ bibId: '.b1', collection: 'BL' }),
      createCandidate({ bibId: '.b2', collection: 'MIXED' }),
      createCandidate({ bibId: '.b3', collection: 'RL' }),
      createCandidate({ bibId: '.b4', collection: null }),
    ])
    expect(classified.matched.map((candidate) => candidate.bibId)).toEqual(['.b1'])
    expect(classified.mixed).toEqual(['.b2'])
    expect(classified.other).toEqual(['.b3', '.b4'])
    expect(classified.duplicates).toEqual([])
  })

  it('should report duplicates only when more than one matched', () => {
    const classified = classifyCandidates({ library: 'nypl', collection: 'RL' }, [
      createCandidate({ bibId: '.b20', collection: 'RL' }),
      createCandidate({ bibId: '.b10', collection: 'RL' }),
      createCandidate({ bibId: '.b15', collection: 'MIXED' }),
      createCandidate({ bibId: '.b16', collection: 'MIXED' }),
    ])
    expect(classified.duplicates).toEqual(['.b10', '.b20'])
    expect(classified.mixed).toEqual(['.b15', '.b16'])
  })

  it('should match every BPL candidate', () => {
    const classified = classifyCandidates({ library: 'bpl', collection: 'NONE' }, [
      createCandidate({ bibId: '.b7', collection: null }),
      createCandidate({ bibId: '.b5', collection: 'RL' }),
    ])
    expect(classified.matched.map((candidate) => candidate.bibId)).toEqual(['.b5', '.b7'])
    expect(classified.other).toEqual([])
  })

  it('should return empty lists without candidates', () => {
    expect(classifyCandidates({ library: 'nypl', collection: 'BL' }, [])).toEqual({
      matched: [],
      mixed: [],
      other: [],
      duplicates: [],
    })
  })
})
