import 'dotenv/config'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'

const BUNDLED_DICTIONARY_DIR = fileURLToPath(new URL('./data/', import.meta.url))

const count = (fallback: number) => z.coerce.number().int().min(0).default(fallback)

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  CORS_ORIGIN: z.string().default('*'),
  DICTIONARY_SOURCE: z.enum(['file', 'firebase']).default('file'),
  DICTIONARY_DIR: z.string().default(BUNDLED_DICTIONARY_DIR),
  DEFAULT_DICTIONARY: z.string().default('english.json'),
  RECOMMENDATION_COUNT: count(9),
  FILLER_COUNT: count(9),
  // fillers are suggested only above this many candidates
  FILLER_MIN_CANDIDATES: count(10),
  REMAINING_WORDS_LIMIT: count(100),
  WORDLISTS_VERSION: z.string().default('v1'),
  FIREBASE_API_KEY: z.string().optional(),
  FIREBASE_PROJECT_ID: z.string().optional(),
  FIREBASE_STORAGE_BUCKET: z.string().optional(),
  FIREBASE_APP_ID: z.string().optional(),
})

export type DictionarySource = 'file' | 'firebase'

export interface SolverSettings {
  recommendationCount: number
  fillerCount: number
  fillerMinCandidates: number
  remainingWordsLimit: number
  defaultDictionary: string
}

export interface FirebaseSettings {
  apiKey?: string
  projectId?: string
  storageBucket?: string
  appId?: string
}

export interface AppConfig {
  port: number
  corsOrigin: string
  dictionarySource: DictionarySource
  dictionaryDir: string
  wordlistsVersion: string
  solver: SolverSettings
  firebase: FirebaseSettings
}

/**
 * Builds the app configuration from environment variables. Unset variables take their defaults;
 * malformed ones throw.
 */
export function readConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new Error(`Invalid configuration ${issue?.path.join('.') ?? ''}: ${issue?.message ?? 'unknown'}`)
  }
  const e = parsed.data
  return {
    port: e.PORT,
    corsOrigin: e.CORS_ORIGIN,
    dictionarySource: e.DICTIONARY_SOURCE,
    dictionaryDir: e.DICTIONARY_DIR,
    wordlistsVersion: e.WORDLISTS_VERSION,
    solver: {
      recommendationCount: e.RECOMMENDATION_COUNT,
      fillerCount: e.FILLER_COUNT,
      fillerMinCandidates: e.FILLER_MIN_CANDIDATES,
      remainingWordsLimit: e.REMAINING_WORDS_LIMIT,
      defaultDictionary: e.DEFAULT_DICTIONARY,
    },
    firebase: {
      apiKey: e.FIREBASE_API_KEY,
      projectId: e.FIREBASE_PROJECT_ID,
      storageBucket: e.FIREBASE_STORAGE_BUCKET,
      appId: e.FIREBASE_APP_ID,
    },
  }
}
