import type { ExerciseCategory } from '../exercise-catalog/exercise-catalog.types'
import type { PhaseBiasConfig, RankingLimits } from './exercise-filter.types'

export const DEFAULT_PHASE_BIAS: PhaseBiasConfig = {
  phases: {
    base: { strength: 3, anaerobic_capacity: 2, aerobic_capacity: 1, power: 0 },
    peak: { anaerobic_power: 2, aerobic_power: 2, power: 1, strength: 0, anaerobic_capacity: -1, aerobic_capacity: -1 },
    taper: { strength: -1, power: -1, aerobic_capacity: 0 },
  },
  enduranceWeakness: {
    base: { add: { aerobic_capacity: 5, strength: -1 } },
    peak: { add: { aerobic_power: 4, anaerobic_power: 2 }, set: { aerobic_capacity: 0 } },
  },
  powerWeakness: {
    base: { add: { strength: 2, power: 2 } },
    peak: { add: { power: 3, anaerobic_power: 1 } },
  },
}

export const DEFAULT_RANKING_LIMITS: RankingLimits = {
  minRanked: 12,
  backfillTarget: 15,
  taperCap: 8,
}

export const SCORE = {
  routeMatch: 5,
  weaknessMatch: 4,
  priorityHigh: 3,
  priorityMedium: 2,
  experience: 2,
  shortExercise: 1,
} as const

export const SHORT_EXERCISE_MINUTES = 30

export const CAMPUS_MIN_BOULDER_GRADE = 5
export const MAX_HANG_MIN_BOULDER_GRADE = 4
export const CAMPUS_MIN_AGE = 18

export const ENDURANCE_CATEGORIES: readonly ExerciseCategory[] = ['aerobic_capacity', 'aerobic_power', 'anaerobic_capacity']
export const POWER_CATEGORIES: readonly ExerciseCategory[] = ['power', 'anaerobic_power', 'strength']

// Keywords are tried in order; the first one found in a weakness whose categories include
// the exercise scores. "power_endurance" also contains "power", so it boosts both groups.
export const WEAKNESS_CATEGORIES: ReadonlyArray<readonly [string, readonly ExerciseCategory[]]> = [
  ['power_endurance', ['anaerobic_capacity', 'aerobic_power']],
  ['power endurance', ['anaerobic_capacity', 'aerobic_power']],
  ['finger', ['strength']],
  ['crimp', ['strength']],
  ['strength', ['strength']],
  ['power', ['power', 'anaerobic_power']],
  ['endurance', ['aerobic_capacity', 'aerobic_power']],
  ['stamina', ['aerobic_capacity']],
  ['pump', ['anaerobic_capacity', 'aerobic_power']],
  ['technique', ['technique']],
  ['footwork', ['technique']],
  ['movement', ['technique']],
  ['core', ['core']],
  ['flexibility', ['mobility']],
  ['mobility', ['mobility']],
]

export const ESSENTIAL_EXERCISES: Record<'endurance' | 'power' | 'balanced', Readonly<Record<string, number>>> = {
  endurance: {
    'Continuous Low-Intensity Climbing': 3,
    'Route 4x4s': 3,
    'Boulder 4x4s': 3,
    'Linked Laps': 2,
    'X-On, X-Off Intervals': 2,
  },
  power: {
    'Fingerboard Max Hangs (Crimps)': 3,
    'Max Boulder Sessions': 3,
    'Campus Board Exercises': 3,
    'Board Session': 3,
    'Boulder Pyramids': 2,
    'Short Boulder Repeats': 2,
  },
  balanced: {
    'Fingerboard Max Hangs (Crimps)': 3,
    'Max Boulder Sessions': 3,
    'Board Session': 2,
    'Boulder Pyramids': 2,
    'Boulder 4x4s': 2,
    'Continuous Low-Intensity Climbing': 2,
  },
}

export const CRITICAL_SYSTEMS: readonly ExerciseCategory[] = [
  'strength',
  'anaerobic_capacity',
  'aerobic_capacity',
  'anaerobic_power',
  'aerobic_power',
]
