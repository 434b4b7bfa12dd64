import { describe, test, expect } from 'vitest'
import { join } from 'node:path'
import { readConfig } from './config'

describe('readConfig', () => {
  test('falls back to defaults', () => {
    const config = readConfig({})
    expect(config.port).toBe(4000)
    expect(config.corsOrigin).toBe('*')
    expect(config.dictionarySource).toBe('file')
    expect(config.wordlistsVersion).toBe('v1')
    expect(join(config.dictionaryDir, 'english.json')).toMatch(/lib[\\/]data[\\/]english\.json$/)
    expect(config.solver).toEqual({
      recommendationCount: 9,
      fillerCount: 9,
      fillerMinCandidates: 10,
      remainingWordsLimit: 100,
      defaultDictionary: 'english.json',
    })
  })

  test('reads overrides from the environment', () => {
    const config = readConfig({
      PORT: '8080',
      DICTIONARY_SOURCE: 'firebase',
      FILLER_MIN_CANDIDATES: '25',
      FIREBASE_STORAGE_BUCKET: 'test-bucket',
    })
    expect(config.port).toBe(8080)
    expect(config.dictionarySource).toBe('firebase')
    expect(config.solver.fillerMinCandidates).toBe(25)
    expect(config.firebase.storageBucket).toBe('test-bucket')
  })

  test('rejects malformed values', () => {
    expect(() => readConfig({ DICTIONARY_SOURCE: 's3' })).toThrow(/^Invalid configuration DICTIONARY_SOURCE/)
    expect(() => readConfig({ PORT: 'abc' })).toThrow(/^Invalid configuration PORT/)
  })
})
