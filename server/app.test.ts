import { afterAll, beforeAll, describe, test, expect, vi } from 'vitest'
import type { Server } from 'node:http'
import { createHash } from 'crypto'
import { createApp } from './app'
import type { DictionaryProvider } from './lib/dictionary'
import { DictionaryFormatError, DictionaryNotFoundError } from './lib/errors'

const DICTIONARIES: Record<string, readonly string[]> = {
  'english.json': ['crane', 'slate', 'place', 'grape'],
  'tiny.json': ['crane'],
}

// in-memory provider with one malformed listed dictionary and one that fails unexpectedly
const dictionaries: DictionaryProvider = {
  async load(id) {
    if (id === 'boom.json') throw new Error('disk on fire')
    if (id === 'draft.json') throw new DictionaryFormatError(id, 'expected a flat JSON array of strings')
    const words = DICTIONARIES[id]
    if (!words) throw new DictionaryNotFoundError(id)
    return words
  },
  async list() {
    return [...Object.keys(DICTIONARIES), 'draft.json'].sort()
  },
}

let server: Server
let baseUrl = ''

beforeAll(async () => {
  const app = createApp({
    dictionaries,
    settings: {
      recommendationCount: 9,
      fillerCount: 9,
      fillerMinCandidates: 10,
      remainingWordsLimit: 100,
      defaultDictionary: 'english.json',
    },
    corsOrigin: '*',
    wordlistsVersion: 'v-test',
  })
  server = await new Promise<Server>(resolve => {
    const s = app.listen(0, '127.0.0.1', () => resolve(s))
  })
  const address = server.address()
  if (!address || typeof address === 'string') throw new Error('server did not bind a port')
  baseUrl = `http://127.0.0.1:${address.port}`
})

afterAll(async () => {
  server.closeAllConnections()
  await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())))
})

function post(path: string, body: string): Promise<Response> {
  return fetch(`${baseUrl}${path}`, { method: 'POST', headers: { 'Content-Type': 'application/json' }, body })
}

describe('GET /api/health', () => {
  test('reports the service as up', async () => {
    const res = await fetch(`${baseUrl}/api/health`)
    expect(res.status).toBe(200)
    expect(await res.json()).toMatchObject({ ok: true, service: 'wordle-helper' })
  })
})

describe('POST /api/next-move', () => {
  test('returns the next-move summary', async () => {
    const res = await post('/api/next-move', JSON.stringify({
      config: { wordLength: 5, prefix: null, dictionary: 'english.json' },
      history: [{ guess: 'crane', feedback: 'bbgbg' }],
    }))
    expect(res.status).toBe(200)
    expect(await res.json()).toMatchObject({
      remainingWords: ['slate'],
      remainingCount: 1,
      guessCount: 2,
      status: 'solved',
      fillerSuggestions: [],
      variablePositions: {},
    })
  })

  test('answers invalid input with 400 INVALID_ARGUMENT', async () => {
    const res = await post('/api/next-move', JSON.stringify({
      config: { wordLength: 5 },
      history: [{ guess: 'crane', feedback: 'bbqbg' }],
    }))
    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({
      error: 'INVALID_ARGUMENT',
      message: 'Feedback "bbqbg" may only contain g, y and b',
    })
  })

  test('answers unparseable JSON with 400 INVALID_ARGUMENT', async () => {
    const res = await post('/api/next-move', '{"config":')
    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({ error: 'INVALID_ARGUMENT', message: 'Request body is not valid JSON' })
  })

  test('answers other rejected bodies with 400 INVALID_ARGUMENT', async () => {
    const res = await fetch(`${baseUrl}/api/next-move`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json; charset=latin1' },
      body: JSON.stringify({ config: { wordLength: 5 } }),
    })
    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({
      error: 'INVALID_ARGUMENT',
      message: 'Request body rejected: unsupported charset "LATIN1"',
    })
  })

  test('answers an unknown dictionary with 404 DICTIONARY_NOT_FOUND', async () => {
    const res = await post('/api/next-move', JSON.stringify({ config: { wordLength: 5, dictionary: 'nope.json' } }))
    expect(res.status).toBe(404)
    expect(await res.json()).toEqual({ error: 'DICTIONARY_NOT_FOUND', message: "Dictionary 'nope.json' not found" })
  })

  test('hides unexpected failures behind INTERNAL_ERROR', async () => {
    const logged = vi.spyOn(console, 'error').mockImplementation(() => {})
    const res = await post('/api/next-move', JSON.stringify({ config: { wordLength: 5, dictionary: 'boom.json' } }))
    expect(res.status).toBe(500)
    expect(await res.json()).toEqual({ error: 'INTERNAL_ERROR', message: 'An unexpected error occurred' })
    expect(logged).toHaveBeenCalledTimes(1)
    logged.mockRestore()
  })
})

describe('POST /api/filler', () => {
  test('returns fillers for the given letters', async () => {
    const res = await post('/api/filler', JSON.stringify({ letters: 'sp', wordLength: 5 }))
    expect(await res.json()).toEqual({ fillerSuggestions: ['slate', 'place', 'grape'] })
  })
})

describe('POST /api/letter-scores', () => {
  test('returns the letter tables for a dictionary', async () => {
    const res = await post('/api/letter-scores', JSON.stringify({ wordLength: 5, dictionary: 'tiny.json' }))
    expect(await res.json()).toEqual({
      frequencies: { c: 20, r: 20, a: 20, n: 20, e: 20 },
      scores: { c: 5, r: 5, a: 5, n: 5, e: 5 },
    })
  })
})

describe('word list endpoints', () => {
  test('serves a dictionary with long-lived cache headers', async () => {
    const res = await fetch(`${baseUrl}/wordlists/tiny.json`)
    expect(res.headers.get('cache-control')).toBe('public, max-age=86400, s-maxage=86400')
    expect(await res.json()).toEqual(['crane'])
  })

  test('describes every usable dictionary in meta.json', async () => {
    const warned = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const res = await fetch(`${baseUrl}/wordlists/meta.json`)
    const sha = (words: readonly string[]) => createHash('sha256').update(JSON.stringify(words)).digest('hex')
    expect(res.status).toBe(200)
    expect(await res.json()).toMatchObject({
      version: 'v-test',
      dictionaries: [
        { id: 'english.json', count: 4, sha256: sha(DICTIONARIES['english.json']) },
        { id: 'tiny.json', count: 1, sha256: sha(DICTIONARIES['tiny.json']) },
      ],
    })
    expect(warned).toHaveBeenCalledWith(
      "[wordlists] skipping draft.json: Dictionary 'draft.json' is not a list of words: expected a flat JSON array of strings",
    )
    warned.mockRestore()
  })
})
