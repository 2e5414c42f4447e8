import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import { createEngineConfig, loadEngineConfig, DEFAULT_RULES_PATH } from '../../../src/config/loader'
import { validateEngineConfig } from '../../../src/config/validation'
import { ConfigurationError } from '../../../src/utils/errors'
import { testConfig } from '../../fixtures/records'

describe('createEngineConfig', () => {
  it('should read the shipped rules', () => {
    const config = createEngineConfig()
    expect(config.libraries.nypl.bibIdTag).toBe('945')
    expect(config.libraries.bpl.bibIdTag).toBe('907')
    expect(config.libraries.nypl.itemField).toEqual({ tag: '949', ind1: ' ', ind2: '1' })
    expect(config.libraries.nypl.defaultLocations).toEqual({ BL: 'zzzzz', RL: 'xxx' })
    expect(config.callNumberVendor).toBe('BT SERIES')
    expect(config.orderFieldRules['960'].u).toBe('fund')
  })

  it('should apply overrides', () => {
    const config = createEngineConfig({ lookupTimeoutMs: 2000, concurrency: 8 })
    expect(config.lookupTimeoutMs).toBe(2000)
    expect(config.concurrency).toBe(8)
  })

  it('should validate overrides', () => {
    expect(() => createEngineConfig({ concurrency: 0 })).toThrow("'concurrency' must be a positive integer")
  })

  it('should reject a fractional concurrency', () => {
    expect(() => createEngineConfig({ concurrency: 1.5 })).toThrow(
      "'concurrency' must be a positive integer",
    )
  })

  it('should read the external item source of BPL', () => {
    const config = createEngineConfig()
    expect(config.libraries.bpl.externalItemSource).toEqual({
      tag: '037',
      code: 'b',
      value: 'OverDrive, Inc.',
      itemField: { tag: '949', ind1: ' ', ind2: '1' },
    })
    expect(config.libraries.nypl.externalItemSource).toBeUndefined()
  })
})

describe('validateEngineConfig', () => {
  const raw = (): Record<string, unknown> => JSON.parse(JSON.stringify(testConfig))

  it('should accept a valid configuration', () => {
    expect(validateEngineConfig(raw())).toEqual(JSON.parse(JSON.stringify(testConfig)))
  })

  it('should name the offending field', () => {
    const config = raw()
    config.orderFieldRules = { '960': { a: 'notAnAttribute' } }
    expect(() => validateEngineConfig(config)).toThrow(ConfigurationError)
    try {
      validateEngineConfig(config)
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError)
      if (error instanceof ConfigurationError) {
        expect(error.context).toEqual({ field: 'orderFieldRules.960.a', value: 'notAnAttribute' })
      }
    }
  })

  it('should require an UNKNOWN vendor', () => {
    const config = createEngineConfig()
    const nypl = { ...config.libraries.nypl, vendors: config.libraries.nypl.vendors.slice(0, 1) }
    expect(() =>
      validateEngineConfig({ ...config, libraries: { ...config.libraries, nypl } }),
    ).toThrow("'libraries.nypl.vendors' must contain an UNKNOWN entry")
  })

  it('should reject unknown matchpoint kinds', () => {
    const config = createEngineConfig()
    const [first, ...rest] = config.libraries.bpl.vendors
    const bpl = {
      ...config.libraries.bpl,
      vendors: [{ ...first, matchpoints: { primary: 'lccn' } }, ...rest],
    }
    expect(() =>
      validateEngineConfig({ ...config, libraries: { ...config.libraries, bpl } }),
    ).toThrow("'libraries.bpl.vendors[0].matchpoints.primary' must be one of: bibId, isbn, oclcNumber, upc")
  })

  it('should reject a missing library', () => {
    const config = createEngineConfig()
    expect(() => validateEngineConfig({ ...config, libraries: { nypl: config.libraries.nypl } })).toThrow(
      "'libraries.bpl' must be an object",
    )
  })
})

describe('loadEngineConfig', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'bib-rules-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('should load the shipped rule file', async () => {
    const config = await loadEngineConfig(DEFAULT_RULES_PATH)
    expect(config).toEqual(createEngineConfig())
  })

  it('should reject invalid JSON', async () => {
    const path = join(dir, 'rules.json')
    await writeFile(path, '{ not json')
    await expect(loadEngineConfig(path)).rejects.toThrow(ConfigurationError)
  })

  it('should reject a missing file', async () => {
    await expect(loadEngineConfig(join(dir, 'missing.json'))).rejects.toThrow(
      `Cannot read rule file '${join(dir, 'missing.json')}'`,
    )
  })
})
