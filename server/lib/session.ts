import { SolverInputError } from './errors'
import { isSolvedFeedback } from './feedback'
import { filterCandidates, matchesLengthAndPrefix, replayHistory } from './solver'
import type { GuessFeedback, SessionStatus, SolverConfig, SolverSession } from './wordleTypes'

export function validateConfig(config: SolverConfig): void {
  if (!Number.isInteger(config.wordLength) || config.wordLength < 1) {
    throw new SolverInputError(`wordLength must be a positive integer, got ${config.wordLength}`)
  }
  if (config.prefix && config.prefix.length > config.wordLength) {
    throw new SolverInputError(`Prefix "${config.prefix}" is longer than ${config.wordLength} letters`)
  }
}

/**
 * Starts a session over the dictionary words that match the configured length and prefix.
 */
export function createSession(dictionary: readonly string[], config: SolverConfig): SolverSession {
  validateConfig(config)
  const pool = dictionary.filter(w => matchesLengthAndPrefix(w, config.wordLength, config.prefix))
  return { config, pool, history: [], candidates: pool }
}

export function applyGuess(session: SolverSession, feedback: GuessFeedback): SolverSession {
  return {
    ...session,
    history: [...session.history, feedback],
    candidates: filterCandidates(session.candidates, feedback),
  }
}

/**
 * Rebuilds a session from its full history. Gives the same candidates as applying each entry in
 * turn with `applyGuess`.
 */
export function replaySession(
  dictionary: readonly string[],
  config: SolverConfig,
  history: readonly GuessFeedback[],
): SolverSession {
  const base = createSession(dictionary, config)
  return { ...base, history: [...history], candidates: replayHistory(base.pool, history) }
}

// 1-based index of the guess about to be made
export function guessCount(session: SolverSession): number {
  return session.history.length + 1
}

export function sessionStatus(session: SolverSession): SessionStatus {
  const last = session.history[session.history.length - 1]
  if (last && isSolvedFeedback(last)) return 'solved'
  if (session.candidates.length === 0) return 'exhausted'
  if (session.candidates.length === 1) return 'solved'
  return 'searching'
}
