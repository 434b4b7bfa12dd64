import type { SolverSettings } from './config'
import type { DictionaryProvider } from './dictionary'
import { toGuessFeedback } from './feedback'
import {
  FillerRequestSchema,
  LetterScoresRequestSchema,
  NextMoveRequestSchema,
  parseRequest,
} from './schemas'
import { guessCount, replaySession, sessionStatus, validateConfig } from './session'
import {
  collectVariableLetters,
  findFillerWords,
  findVariablePositions,
  letterFrequencies,
  normalizeFrequencies,
  recommendGuesses,
} from './solver'
import type {
  LetterFrequencyTable,
  NextMoveResponse,
  NormalizedScoreTable,
  SolverConfig,
} from './wordleTypes'

export interface SolverDeps {
  dictionaries: DictionaryProvider
  settings: SolverSettings
}

const round2 = (n: number) => Math.round(n * 100) / 100

function formatVariablePositions(positions: Map<number, Set<string>>): Record<string, string[]> {
  const out: Record<string, string[]> = {}
  for (const [pos, letters] of positions) out[String(pos)] = [...letters].sort()
  return out
}

/**
 * The function `calculateNextMove` answers one stateless solver request: it rebuilds the session
 * from the caller's full history and reports recommendations, remaining candidates and filler
 * suggestions.
 * @param {unknown} body - Raw request body, `{ config, history }`.
 * @param {SolverDeps} deps - Dictionary source and output limits.
 * @returns The next-move summary. Recommendations come from the remaining candidates only, but
 * letter frequencies are taken over the whole dictionary, which gives denser statistics once few
 * candidates are left.
 *
 * Every history entry is validated before the dictionary is loaded or any filtering starts.
 */
export async function calculateNextMove(body: unknown, deps: SolverDeps): Promise<NextMoveResponse> {
  const request = parseRequest(NextMoveRequestSchema, body)
  const config: SolverConfig = {
    wordLength: request.config.wordLength,
    prefix: request.config.prefix,
    dictionary: request.config.dictionary ?? deps.settings.defaultDictionary,
  }
  validateConfig(config)
  const history = request.history.map(entry => toGuessFeedback(entry, config))

  const dictionary = await deps.dictionaries.load(config.dictionary)
  const session = replaySession(dictionary, config, history)
  const index = guessCount(session)
  const { candidates } = session
  const { settings } = deps

  const recommendations = recommendGuesses({
    pool: candidates,
    length: config.wordLength,
    prefix: config.prefix,
    topN: settings.recommendationCount,
    guessIndex: index,
    scoringBasis: dictionary,
  })

  const variablePositions = findVariablePositions(candidates)
  const variableLetters = collectVariableLetters(variablePositions)
  const fillerSuggestions =
    variableLetters.size > 0 && candidates.length > settings.fillerMinCandidates
      ? findFillerWords(dictionary, variableLetters, config.wordLength, settings.fillerCount)
      : []

  return {
    recommendations: recommendations.map(r => ({ word: r.word, score: round2(r.score) })),
    remainingWords: candidates.slice(0, settings.remainingWordsLimit),
    remainingCount: candidates.length,
    variablePositions: formatVariablePositions(variablePositions),
    fillerSuggestions,
    guessCount: index,
    status: sessionStatus(session),
  }
}

/**
 * Filler words for letters the caller picked by hand.
 */
export async function suggestFillers(body: unknown, deps: SolverDeps): Promise<{ fillerSuggestions: string[] }> {
  const request = parseRequest(FillerRequestSchema, body)
  const dictionary = await deps.dictionaries.load(request.dictionary ?? deps.settings.defaultDictionary)
  return {
    fillerSuggestions: findFillerWords(
      dictionary,
      request.letters,
      request.wordLength,
      request.count ?? deps.settings.fillerCount,
    ),
  }
}

export async function computeLetterScores(
  body: unknown,
  deps: SolverDeps,
): Promise<{ frequencies: LetterFrequencyTable; scores: NormalizedScoreTable }> {
  const request = parseRequest(LetterScoresRequestSchema, body)
  const dictionary = await deps.dictionaries.load(request.dictionary ?? deps.settings.defaultDictionary)
  const frequencies = letterFrequencies(dictionary, request.wordLength, request.prefix)
  const scores = normalizeFrequencies(frequencies)
  return {
    frequencies: Object.fromEntries(Object.entries(frequencies).map(([ch, v]) => [ch, round2(v)])),
    scores: Object.fromEntries(Object.entries(scores).map(([ch, v]) => [ch, round2(v)])),
  }
}
