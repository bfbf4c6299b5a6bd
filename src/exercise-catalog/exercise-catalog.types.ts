export const EXERCISE_CATEGORIES = [
  'strength',
  'power',
  'anaerobic_capacity',
  'anaerobic_power',
  'aerobic_capacity',
  'aerobic_power',
  'technique',
  'core',
  'mobility',
  'warm_up',
  'cool_down',
] as const

export type ExerciseCategory = (typeof EXERCISE_CATEGORIES)[number]

export type ExercisePriority = 'high' | 'medium'

export type ExerciseDef = {
  readonly name: string
  readonly category: ExerciseCategory
  readonly priority: ExercisePriority
  readonly timeRequired: number // minutes
  readonly requiredFacilities: readonly string[]
  readonly compatibleWith?: readonly string[]
  readonly description: string
}
