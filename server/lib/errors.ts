// =============================================================================
// Error Codes - Stable identifiers returned to API callers
// =============================================================================

export const SolverErrorCodes = {
  INVALID_ARGUMENT: 'INVALID_ARGUMENT',
  DICTIONARY_NOT_FOUND: 'DICTIONARY_NOT_FOUND',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const

export type SolverErrorCode = typeof SolverErrorCodes[keyof typeof SolverErrorCodes]

const HTTP_STATUS: Record<SolverErrorCode, number> = {
  INVALID_ARGUMENT: 400,
  DICTIONARY_NOT_FOUND: 404,
  INTERNAL_ERROR: 500,
}

export const INTERNAL_ERROR_MESSAGE = 'An unexpected error occurred'

export class SolverError extends Error {
  readonly code: SolverErrorCode

  constructor(code: SolverErrorCode, message: string) {
    super(message)
    this.name = new.target.name
    this.code = code
  }
}

// =============================================================================
// Caller input
// =============================================================================

export class SolverInputError extends SolverError {
  constructor(message: string) {
    super(SolverErrorCodes.INVALID_ARGUMENT, message)
  }
}

export class FeedbackLengthError extends SolverInputError {
  constructor(word: string, expected: number) {
    super(`"${word}" has ${word.length} letters but the feedback covers ${expected}`)
  }
}

export class InvalidFeedbackError extends SolverInputError {
  constructor(feedback: string) {
    super(`Feedback "${feedback}" may only contain g, y and b`)
  }
}

// =============================================================================
// Dictionaries
// =============================================================================

export class DictionaryNotFoundError extends SolverError {
  constructor(id: string) {
    super(SolverErrorCodes.DICTIONARY_NOT_FOUND, `Dictionary '${id}' not found`)
  }
}

export class DictionaryFormatError extends SolverError {
  constructor(id: string, detail: string) {
    super(SolverErrorCodes.DICTIONARY_NOT_FOUND, `Dictionary '${id}' is not a list of words: ${detail}`)
  }
}

export function httpStatusFor(code: SolverErrorCode): number {
  return HTTP_STATUS[code]
}

/**
 * Wire form of an error. Anything that is not a `SolverError` is reported as an internal error
 * with a fixed message.
 */
export function toErrorBody(err: unknown): { error: SolverErrorCode; message: string } {
  if (err instanceof SolverError) return { error: err.code, message: err.message }
  return { error: SolverErrorCodes.INTERNAL_ERROR, message: INTERNAL_ERROR_MESSAGE }
}
