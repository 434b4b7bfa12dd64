import { FeedbackLengthError, InvalidFeedbackError, SolverInputError } from './errors'
import type { FeedbackSymbol, GuessFeedback, HistoryEntry, PatternChar, SolverConfig } from './wordleTypes'

const SYMBOL_BY_CHAR: Record<PatternChar, FeedbackSymbol> = {
  g: 'correct',
  y: 'present',
  b: 'absent',
}

const CHAR_BY_SYMBOL: Record<FeedbackSymbol, PatternChar> = {
  correct: 'g',
  present: 'y',
  absent: 'b',
}

function isPatternChar(ch: string): ch is PatternChar {
  return ch === 'g' || ch === 'y' || ch === 'b'
}

/**
 * Converts a feedback string such as `"bygbb"` into symbols. Case is ignored; any character other
 * than g, y or b rejects the whole string.
 */
export function parseFeedback(feedbackRaw: string): FeedbackSymbol[] {
  const feedback = feedbackRaw.toLowerCase()
  const symbols: FeedbackSymbol[] = []
  for (const ch of feedback) {
    if (!isPatternChar(ch)) throw new InvalidFeedbackError(feedbackRaw)
    symbols.push(SYMBOL_BY_CHAR[ch])
  }
  return symbols
}

export function pairGuessFeedback(guessRaw: string, feedbackRaw: string): GuessFeedback {
  const guess = guessRaw.toLowerCase()
  const symbols = parseFeedback(feedbackRaw)
  if (symbols.length !== guess.length) throw new FeedbackLengthError(guess, symbols.length)
  return symbols.map((symbol, i) => ({ letter: guess[i], symbol }))
}

export function feedbackToKey(feedback: GuessFeedback): string {
  return feedback.map(f => CHAR_BY_SYMBOL[f.symbol]).join('')
}

export function isSolvedFeedback(feedback: GuessFeedback): boolean {
  return feedback.length > 0 && feedback.every(f => f.symbol === 'correct')
}

/**
 * Validates one history entry against the session config and pairs it up. Guesses must be
 * letters only and `config.wordLength` long. Filler words are valid guesses, so
 * the prefix is not enforced.
 */
export function toGuessFeedback(entry: HistoryEntry, config: SolverConfig): GuessFeedback {
  const guess = entry.guess.toLowerCase()
  if (!/^[a-z]+$/.test(guess)) {
    throw new SolverInputError(`Guess "${entry.guess}" must contain only letters`)
  }
  if (guess.length !== config.wordLength) {
    throw new SolverInputError(`Guess "${entry.guess}" must be ${config.wordLength} letters long`)
  }
  if (entry.feedback.length !== config.wordLength) {
    throw new FeedbackLengthError(guess, entry.feedback.length)
  }
  return pairGuessFeedback(guess, entry.feedback)
}
