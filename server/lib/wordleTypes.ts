export type PatternChar = 'g' | 'y' | 'b'

export type FeedbackSymbol = 'correct' | 'present' | 'absent'

export interface LetterFeedback {
  letter: string
  symbol: FeedbackSymbol
}

// one entry per letter of the guess, in order
export type GuessFeedback = LetterFeedback[]

/**
 * A guess and its feedback as the caller sends them, e.g. `{ guess: 'crane', feedback: 'bbgbg' }`.
 */
export interface HistoryEntry {
  guess: string
  feedback: string
}

export interface SolverConfig {
  wordLength: number
  prefix: string | null
  dictionary: string
}

// letter -> percentage of all letters counted, highest first
export type LetterFrequencyTable = Record<string, number>

// letter -> score in [0, 10]
export type NormalizedScoreTable = Record<string, number>

export interface Recommendation {
  word: string
  score: number
}

export type SessionStatus = 'searching' | 'solved' | 'exhausted'

/**
 * Everything known about one solving attempt.
 *
 * @property pool - Dictionary words matching the configured length and prefix.
 * @property history - Accepted guesses, oldest first.
 * @property candidates - Words of `pool` consistent with every entry of `history`.
 */
export interface SolverSession {
  readonly config: SolverConfig
  readonly pool: readonly string[]
  readonly history: readonly GuessFeedback[]
  readonly candidates: readonly string[]
}

export interface NextMoveResponse {
  recommendations: Recommendation[]
  remainingWords: string[]
  remainingCount: number
  variablePositions: Record<string, string[]>
  fillerSuggestions: string[]
  guessCount: number
  status: SessionStatus
}
