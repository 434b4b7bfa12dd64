import { FeedbackLengthError, SolverInputError } from './errors'
import type {
  GuessFeedback,
  LetterFrequencyTable,
  NormalizedScoreTable,
  Recommendation,
} from './wordleTypes'

export const DEFAULT_TOP_N = 9

// Guesses up to this index score each distinct letter once.
const DISTINCT_LETTER_GUESSES = 2

function assertInteger(name: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new SolverInputError(`${name} must be an integer >= ${min}, got ${value}`)
  }
}

export function matchesLengthAndPrefix(word: string, length: number, prefix?: string | null): boolean {
  return word.length === length && (!prefix || word.startsWith(prefix))
}

function occurrences(word: string, letter: string): number {
  let n = 0
  for (const ch of word) if (ch === letter) n++
  return n
}

function increment(map: Map<string, number>, key: string): void {
  map.set(key, (map.get(key) ?? 0) + 1)
}

/**
 * The function `filterCandidates` keeps the words that could still be the answer after one guess.
 * @param {readonly string[]} words - Words to narrow, all of the feedback's length.
 * @param {GuessFeedback} feedback - One guess paired with its per-letter feedback.
 * @returns The words of `words` consistent with `feedback`, in their original order.
 *
 * @remarks
 * Repeated letters are judged by counts, not by membership. For each letter, the greens and
 * yellows it received are tallied first:
 * - a green needs the letter at that position and at least as many copies as there are greens;
 * - a yellow needs a copy outside that position beyond the ones pinned green;
 * - a black only forbids copies beyond the greens and yellows of the same letter.
 */
export function filterCandidates(words: readonly string[], feedback: GuessFeedback): string[] {
  if (feedback.length === 0) return words.slice()
  const mismatched = words.find(w => w.length !== feedback.length)
  if (mismatched !== undefined) throw new FeedbackLengthError(mismatched, feedback.length)

  const correctCount = new Map<string, number>()
  const presentCount = new Map<string, number>()
  for (const { letter, symbol } of feedback) {
    if (symbol === 'correct') increment(correctCount, letter)
    else if (symbol === 'present') increment(presentCount, letter)
  }

  return words.filter(word => {
    for (let i = 0; i < feedback.length; i++) {
      const { letter, symbol } = feedback[i]
      const have = occurrences(word, letter)
      const greens = correctCount.get(letter) ?? 0
      switch (symbol) {
        case 'correct':
          if (word[i] !== letter || have < greens) return false
          break
        case 'present':
          if (have === 0 || word[i] === letter || have <= greens) return false
          break
        case 'absent':
          if (have > greens + (presentCount.get(letter) ?? 0)) return false
          break
      }
    }
    return true
  })
}

/**
 * Narrows `pool` by every entry of `history`, oldest first.
 */
export function replayHistory(pool: readonly string[], history: readonly GuessFeedback[]): string[] {
  return history.reduce<string[]>((words, feedback) => filterCandidates(words, feedback), pool.slice())
}

/**
 * The function `letterFrequencies` computes how often each letter occurs in a basis word list.
 * @param {readonly string[]} basis - Words to count letters over. Only words of `length` starting
 * with `prefix` are counted, and the prefix itself is skipped.
 * @param {number} length - Target word length.
 * @param {string | null} [prefix] - Optional shared prefix.
 * @returns Letter percentages of all letters counted, highest first. Empty when nothing was
 * counted.
 */
export function letterFrequencies(
  basis: readonly string[],
  length: number,
  prefix?: string | null,
): LetterFrequencyTable {
  assertInteger('length', length, 1)
  const skip = prefix?.length ?? 0
  const counts = new Map<string, number>()
  let total = 0
  for (const word of basis) {
    if (!matchesLengthAndPrefix(word, length, prefix)) continue
    for (const ch of word.slice(skip)) {
      increment(counts, ch)
      total++
    }
  }
  if (total === 0) return {}
  const sorted = [...counts.entries()].sort((a, b) => b[1] - a[1])
  return Object.fromEntries(sorted.map(([ch, n]) => [ch, (n / total) * 100]))
}

/**
 * Rescales a frequency table linearly so the rarest letter scores 0 and the commonest 10. When
 * every letter is equally common they all score 5.
 */
export function normalizeFrequencies(frequencies: LetterFrequencyTable): NormalizedScoreTable {
  const entries = Object.entries(frequencies)
  if (entries.length === 0) return {}
  const values = entries.map(([, v]) => v)
  const max = Math.max(...values)
  const min = Math.min(...values)
  if (max === min) return Object.fromEntries(entries.map(([ch]) => [ch, 5]))
  return Object.fromEntries(entries.map(([ch, v]) => [ch, ((v - min) / (max - min)) * 10]))
}

/**
 * Heuristic score of `word` as the next guess. This approximates information gain by letter
 * commonness; it is not an entropy calculation.
 *
 * For the first two guesses each distinct letter counts once, favouring words that cover many
 * letters. From the third guess on every occurrence counts, so confirming a common repeated letter
 * is no longer penalised. Letters missing from `scores` add nothing.
 */
export function scoreGuess(word: string, scores: NormalizedScoreTable, guessIndex: number): number {
  assertInteger('guessIndex', guessIndex, 1)
  const letters = guessIndex > DISTINCT_LETTER_GUESSES ? [...word] : [...new Set(word)]
  return letters.reduce((sum, ch) => sum + (scores[ch] ?? 0), 0)
}

export interface RecommendOptions {
  pool: readonly string[]
  length: number
  prefix?: string | null
  topN?: number
  guessIndex?: number
  // Letter frequencies come from here; defaults to `pool`.
  scoringBasis?: readonly string[]
}

/**
 * The function `recommendGuesses` ranks the words of a pool as next guesses.
 * @param {RecommendOptions} options - `scoringBasis` may be wider than `pool` (for example the
 * whole dictionary while `pool` holds only the remaining candidates); only `pool` words are ranked.
 * @returns At most `topN` recommendations, best first. Equal scores keep pool order. An empty pool
 * after the length/prefix filter gives an empty list.
 */
export function recommendGuesses(options: RecommendOptions): Recommendation[] {
  const { pool, length, prefix, topN = DEFAULT_TOP_N, guessIndex = 1, scoringBasis = pool } = options
  assertInteger('length', length, 1)
  assertInteger('topN', topN, 0)
  assertInteger('guessIndex', guessIndex, 1)

  const words = pool.filter(w => matchesLengthAndPrefix(w, length, prefix))
  if (words.length === 0) return []

  const scores = normalizeFrequencies(letterFrequencies(scoringBasis, length, prefix))
  return words
    .map(word => ({ word, score: scoreGuess(word, scores, guessIndex) }))
    .sort((a, b) => b.score - a.score)
    .slice(0, topN)
}

/**
 * Positions where the candidates still disagree, with the letters seen there.
 */
export function findVariablePositions(candidates: readonly string[]): Map<number, Set<string>> {
  const positions = new Map<number, Set<string>>()
  if (candidates.length === 0) return positions
  const length = candidates[0].length
  for (let i = 0; i < length; i++) positions.set(i, new Set<string>())
  for (const word of candidates) {
    if (word.length !== length) {
      throw new SolverInputError(`Candidates must share one length; "${word}" is not ${length} letters`)
    }
    for (let i = 0; i < length; i++) positions.get(i)?.add(word[i])
  }
  for (const [pos, letters] of positions) {
    if (letters.size <= 1) positions.delete(pos)
  }
  return positions
}

export function collectVariableLetters(positions: ReadonlyMap<number, ReadonlySet<string>>): Set<string> {
  const letters = new Set<string>()
  for (const set of positions.values()) for (const ch of set) letters.add(ch)
  return letters
}

/**
 * The function `findFillerWords` suggests exploratory guesses that test as many undetermined
 * letters as possible. Fillers need not be candidates.
 * @param {readonly string[]} words - Broad word list to search, usually the whole dictionary.
 * @param {Iterable<string>} letters - Letters to probe; a string such as `"bhptw"` works too.
 * @param {number} length - Target word length.
 * @param {number} [topN] - Maximum number of words returned.
 * @returns Words of `length` containing at least one of `letters`, ordered by how many distinct
 * letters of `letters` they contain. Equal counts keep list order.
 */
export function findFillerWords(
  words: readonly string[],
  letters: Iterable<string>,
  length: number,
  topN: number = DEFAULT_TOP_N,
): string[] {
  assertInteger('length', length, 1)
  assertInteger('topN', topN, 0)
  const wanted = [...new Set(letters)]
  if (wanted.length === 0) return []
  return words
    .filter(w => w.length === length)
    .map(word => ({ word, hits: wanted.filter(ch => word.includes(ch)).length }))
    .filter(s => s.hits > 0)
    .sort((a, b) => b.hits - a.hits)
    .slice(0, topN)
    .map(s => s.word)
}
