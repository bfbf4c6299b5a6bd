import { normalizeAttributeRatings, parseAttributeRatings } from './attribute-ratings'
import type { AttributeRatings, ClimberNeeds, ClimberProfile, ExperienceLevel } from './climber-profile.types'

export const DEFAULT_SESSION_MINUTES = 120

export const DEFAULT_GYM_FACILITIES: readonly string[] = [
  'bouldering_wall',
  'fingerboard',
  'campus_board',
  'pullup_bar',
  'climbing_board',
  'circuit_board',
]

const WALL_FACILITIES = new Set(['bouldering_wall', 'lead_wall', 'spray_wall', 'circuit_board', 'climbing_board', 'auto_belay'])

const ALWAYS_AVAILABLE = ['open_space', 'mat']

const FACILITY_ALIASES: Record<string, string> = {
  hangboard: 'fingerboard',
  pull_up_bar: 'pullup_bar',
  boulder_wall: 'bouldering_wall',
  bouldering: 'bouldering_wall',
  system_board: 'climbing_board',
  moonboard: 'climbing_board',
  kilter_board: 'climbing_board',
  campus: 'campus_board',
  lead: 'lead_wall',
  resistance_band: 'band',
}

const EMPTY_FACILITY_MARKERS = new Set(['none', 'n/a', 'na'])

// Font (and French-style bouldering) grade -> V grade
const FONT_TO_V: Record<string, number> = {
  '4': 0,
  '5': 1,
  '5+': 2,
  '6A': 3,
  '6A+': 3,
  '6B': 4,
  '6B+': 4,
  '6C': 5,
  '6C+': 5,
  '7A': 6,
  '7A+': 7,
  '7B': 8,
  '7B+': 8,
  '7C': 9,
  '7C+': 10,
  '8A': 11,
  '8A+': 12,
  '8B': 13,
  '8B+': 14,
  '8C': 15,
}

/**
 * Session budget in minutes. Uses the first number in the text: "hour"
 * means hours, "min"/"minute" means minutes, anything else is read as
 * hours. No number at all gives DEFAULT_SESSION_MINUTES.
 */
export function parseSessionMinutes(text: string | null | undefined): number {
  if (!text) return DEFAULT_SESSION_MINUTES
  const match = /(\d+(?:\.\d+)?)/.exec(text)
  if (!match) return DEFAULT_SESSION_MINUTES

  const value = Number(match[1])
  const lower = text.toLowerCase()
  if (lower.includes('hour')) return Math.floor(value * 60)
  if (lower.includes('min')) return Math.floor(value)
  return Math.floor(value * 60)
}

export function resolveYearsExperience(profile: ClimberProfile): number | null {
  if (typeof profile.yearsExperience === 'number' && Number.isFinite(profile.yearsExperience) && profile.yearsExperience >= 0) {
    return profile.yearsExperience
  }

  const text = (profile.experience ?? '').toLowerCase()
  const match = /(<\s*)?(\d+(?:\.\d+)?)\s*(?:year|yr)/.exec(text)
  if (!match) return null

  const value = Number(match[2])
  // "<1 year" reads as half of that
  return match[1] ? value / 2 : value
}

export function resolveExperienceLevel(profile: ClimberProfile): ExperienceLevel {
  const years = resolveYearsExperience(profile)
  if (years !== null) {
    if (years < 1) return 'beginner'
    if (years >= 5) return 'advanced'
    return 'intermediate'
  }

  const text = (profile.experience ?? '').toLowerCase()
  if (['beginner', 'novice', 'starting'].some((t) => text.includes(t))) return 'beginner'
  if (['advanced', 'expert', 'many years'].some((t) => text.includes(t))) return 'advanced'
  return 'intermediate'
}

export function normalizeFacilityToken(raw: string): string {
  const key = raw
    .trim()
    .toLowerCase()
    .replace(/[\s-]+/g, '_')
  return FACILITY_ALIASES[key] ?? key
}

/**
 * Facility tokens the climber can use. Nothing supplied means a typical
 * gym. Any wall implies the generic `wall` token and a bouldering wall
 * implies a `bouldering_area`; open floor space and a mat are assumed.
 */
export function resolveAvailableFacilities(facilities: readonly string[] | null | undefined): Set<string> {
  const tokens = (facilities ?? [])
    .map(normalizeFacilityToken)
    .filter((t) => t.length > 0 && !EMPTY_FACILITY_MARKERS.has(t))

  const out = new Set(tokens.length > 0 ? tokens : DEFAULT_GYM_FACILITIES)

  if ([...out].some((f) => WALL_FACILITIES.has(f))) out.add('wall')
  if (out.has('bouldering_wall')) out.add('bouldering_area')
  for (const f of ALWAYS_AVAILABLE) out.add(f)

  return out
}

export function parseBoulderGrade(text: string | null | undefined): number | null {
  if (!text) return null
  const grade = text.trim().toUpperCase()

  const v = /^V(\d+)/.exec(grade)
  if (v) return Number(v[1])

  const font = /^F?B?\s*([4-8][ABC]?\+?)$/.exec(grade.replace(/^FONT\s*/, ''))
  if (font && font[1] !== undefined) {
    const mapped = FONT_TO_V[font[1]]
    if (mapped !== undefined) return mapped
  }
  return null
}

export function resolveAttributeRatings(profile: ClimberProfile): AttributeRatings {
  if (profile.attributeRatings && Object.keys(profile.attributeRatings).length > 0) {
    return normalizeAttributeRatings(profile.attributeRatings)
  }
  return parseAttributeRatings(profile.attributeRatingsText)
}

function splitList(text: string | undefined): string[] {
  return (text ?? '')
    .toLowerCase()
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
}

/** Attributes rated 1-2 plus the free-text weaknesses, lower-cased. */
export function collectWeaknesses(profile: ClimberProfile, ratings: AttributeRatings): string[] {
  const fromRatings = Object.entries(ratings)
    .filter(([, rating]) => rating <= 2)
    .map(([attr]) => attr)
  return [...new Set([...fromRatings, ...splitList(profile.weaknesses)])]
}

/** Attributes rated 4-5 plus the free-text strengths, lower-cased. */
export function collectStrengths(profile: ClimberProfile, ratings: AttributeRatings): string[] {
  const fromRatings = Object.entries(ratings)
    .filter(([, rating]) => rating >= 4)
    .map(([attr]) => attr)
  return [...new Set([...fromRatings, ...splitList(profile.strengths)])]
}

function isLow(ratings: AttributeRatings, ...keys: string[]): boolean {
  return keys.some((k) => {
    const rating = ratings[k]
    return rating !== undefined && rating <= 2
  })
}

export function analyzeNeeds(profile: ClimberProfile, ratings: AttributeRatings): ClimberNeeds {
  const weaknesses = (profile.weaknesses ?? '').toLowerCase()
  const mentions = (...words: string[]) => words.some((w) => weaknesses.includes(w))

  return {
    strength: isLow(ratings, 'finger_strength', 'power') || mentions('strength', 'power', 'finger', 'crimp'),
    endurance: isLow(ratings, 'endurance', 'stamina') || mentions('endurance', 'pump', 'stamina'),
    powerEndurance: isLow(ratings, 'power_endurance') || mentions('power endurance', 'power-endurance'),
    technique: isLow(ratings, 'technique') || mentions('technique', 'footwork', 'movement'),
  }
}
