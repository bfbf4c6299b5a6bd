import type { ExerciseCategory, ExerciseDef } from '../exercise-catalog/exercise-catalog.types'
import type { PhaseType } from '../phase-structure/phase-structure.types'

export type PhaseContext = {
  type: PhaseType
  weeks: number
}

/** Request-scoped copy of a catalog entry; never written back. */
export type RankedExercise = ExerciseDef & {
  score: number
  notes?: string[]
}

export type CategoryWeights = Partial<Record<ExerciseCategory, number>>

export type WeightAdjustment = {
  add?: CategoryWeights
  set?: CategoryWeights
}

export type PhaseBiasConfig = {
  phases: Record<PhaseType, CategoryWeights>
  // route is endurance and endurance rated <= 2
  enduranceWeakness: Partial<Record<PhaseType, WeightAdjustment>>
  // route is power and power rated <= 2
  powerWeakness: Partial<Record<PhaseType, WeightAdjustment>>
}

export type RankingLimits = {
  minRanked: number
  backfillTarget: number
  taperCap: number
}
