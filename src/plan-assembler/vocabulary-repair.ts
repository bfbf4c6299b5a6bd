import { distance } from 'fastest-levenshtein'
import { UnresolvedExerciseNameError } from '../errors/plan-generation.errors'
import type { FocusRepair } from './plan-assembler.types'

export const FOCUS_DELIMITER = '+'
export const MIN_NAME_SIMILARITY = 0.8

/** 1 - editDistance / longer length, compared case-insensitively. */
export function nameSimilarity(a: string, b: string): number {
  const x = a.toLowerCase()
  const y = b.toLowerCase()
  const longest = Math.max(x.length, y.length)
  if (longest === 0) return 1
  return 1 - distance(x, y) / longest
}

export function splitFocus(focus: string): string[] {
  return focus
    .split(FOCUS_DELIMITER)
    .map((t) => t.trim())
    .filter((t) => t.length > 0)
}

/**
 * Exact name wins; otherwise the most similar name at or above the cutoff.
 * Ties keep the earlier name in `validNames`.
 */
export function resolveExerciseName(
  token: string,
  validNames: readonly string[],
  minSimilarity = MIN_NAME_SIMILARITY,
): { name: string; similarity: number } {
  if (validNames.includes(token)) return { name: token, similarity: 1 }

  let best: string | null = null
  let bestScore = -1
  for (const name of validNames) {
    const score = nameSimilarity(token, name)
    if (score > bestScore) {
      best = name
      bestScore = score
    }
  }

  if (best === null || bestScore < minSimilarity) {
    throw new UnresolvedExerciseNameError(token, best, Math.max(bestScore, 0))
  }
  return { name: best, similarity: bestScore }
}

export type RepairedFocus = {
  names: string[]
  repairs: FocusRepair[]
}

/** Never throws: unresolved tokens are dropped and reported in `repairs`. */
export function repairFocus(focus: string, validNames: readonly string[], minSimilarity = MIN_NAME_SIMILARITY): RepairedFocus {
  const names: string[] = []
  const repairs: FocusRepair[] = []

  for (const token of splitFocus(focus)) {
    try {
      const resolved = resolveExerciseName(token, validNames, minSimilarity)
      if (resolved.name !== token) {
        repairs.push({ kind: 'substituted', token, replacement: resolved.name, similarity: resolved.similarity })
      }
      if (!names.includes(resolved.name)) names.push(resolved.name)
    } catch (err) {
      if (!(err instanceof UnresolvedExerciseNameError)) throw err
      repairs.push({ kind: 'dropped', token, bestCandidate: err.bestCandidate, similarity: err.similarity })
    }
  }

  return { names, repairs }
}
