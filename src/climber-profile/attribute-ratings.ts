import type { AttributeRatings } from './climber-profile.types'

const LABELED_PAIR = /([A-Za-z][A-Za-z _-]*?)\s*[:=]\s*(-?\d+(?:\.\d+)?)/g

export function canonicalAttributeKey(label: string): string {
  return label
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '')
}

function toRating(value: unknown): number | null {
  const n = typeof value === 'string' && value.trim().length > 0 ? Number(value) : value
  if (typeof n !== 'number' || !Number.isInteger(n)) return null
  if (n < 1 || n > 5) return null
  return n
}

function fromStructured(text: string): AttributeRatings | null {
  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch {
    return null
  }
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) return null
  return normalizeAttributeRatings(parsed)
}

function fromLabeledPairs(text: string): AttributeRatings {
  const out: AttributeRatings = {}
  for (const match of text.matchAll(LABELED_PAIR)) {
    const key = canonicalAttributeKey(match[1] ?? '')
    const rating = toRating(Number(match[2]))
    if (key && rating !== null) out[key] = rating
  }
  return out
}

/**
 * Self-ratings from free text. A JSON object is tried first, then
 * `label: n` / `label=n` pairs. Ratings outside 1..5 are ignored and
 * unreadable input gives an empty map.
 */
export function parseAttributeRatings(text: string | null | undefined): AttributeRatings {
  if (!text || text.trim().length === 0) return {}
  return fromStructured(text.trim()) ?? fromLabeledPairs(text)
}

export function normalizeAttributeRatings(ratings: object): AttributeRatings {
  const out: AttributeRatings = {}
  for (const [label, value] of Object.entries(ratings)) {
    const key = canonicalAttributeKey(label)
    const rating = toRating(value)
    if (key && rating !== null) out[key] = rating
  }
  return out
}
