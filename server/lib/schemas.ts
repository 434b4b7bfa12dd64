import { z } from 'zod'
import { SolverInputError } from './errors'

const letters = z.string().regex(/^[A-Za-z]*$/, 'must contain only letters')

export const SolverConfigSchema = z.object({
  wordLength: z.number().int().positive().default(5),
  prefix: letters.nullish().transform(p => (p ? p.toLowerCase() : null)),
  dictionary: z.string().min(1).optional(),
})

export const HistoryEntrySchema = z.object({
  guess: z.string().min(1),
  feedback: z.string().min(1),
})

export const NextMoveRequestSchema = z.object({
  config: SolverConfigSchema,
  history: z.array(HistoryEntrySchema).default([]),
})

export const FillerRequestSchema = z.object({
  dictionary: z.string().min(1).optional(),
  wordLength: z.number().int().positive().default(5),
  letters: letters.min(1).transform(s => s.toLowerCase()),
  count: z.number().int().min(0).max(100).optional(),
})

export const LetterScoresRequestSchema = SolverConfigSchema

export const DictionaryFileSchema = z.array(z.string())

/**
 * Parses `data` with `schema`, turning the first validation issue into a `SolverInputError`.
 */
export function parseRequest<S extends z.ZodTypeAny>(schema: S, data: unknown): z.output<S> {
  const result = schema.safeParse(data)
  if (result.success) return result.data
  const issue = result.error.issues[0]
  const where = issue && issue.path.length > 0 ? issue.path.join('.') : 'request'
  throw new SolverInputError(`${where}: ${issue?.message ?? 'invalid value'}`)
}
