export type ExperienceLevel = 'beginner' | 'intermediate' | 'advanced'

/** Canonical snake_case attribute key -> self-rating 1..5 */
export type AttributeRatings = Record<string, number>

/**
 * Everything optional: absent values fall back to the defaults documented
 * on the resolver functions in climber-profile.parsing.ts.
 */
export type ClimberProfile = {
  currentGrade?: string
  maxBoulderGrade?: string
  strengths?: string // comma separated
  weaknesses?: string // comma separated
  attributeRatings?: AttributeRatings
  attributeRatingsText?: string // JSON object or "label: n" pairs
  facilities?: string[] // empty => typical gym
  sessionTime?: string // "90 minutes", "2 hours"; absent => 120 min
  yearsExperience?: number
  experience?: string // "3 years", "beginner", ...
  injuries?: string
  age?: number
  notes?: string
}

export type ClimberNeeds = {
  strength: boolean
  endurance: boolean
  powerEndurance: boolean
  technique: boolean
}
