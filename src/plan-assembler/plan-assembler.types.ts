import type { ClimberProfile } from '../climber-profile/climber-profile.types'
import type { Phase, Weekday } from '../phase-structure/phase-structure.types'
import type { RouteDescriptor, RouteFeatures } from '../route-features/route-features.types'

export type PlanRequest = {
  route: RouteDescriptor
  profile: ClimberProfile
  weeksToTrain: number
  sessionsPerWeek: number
  previousAnalysis?: string
}

export type ExerciseDetail = {
  name: string
  details: string
}

export type DaySchedule = {
  day: Weekday
  focus: string[]
  details: string
  exercises?: ExerciseDetail[]
}

export type PhasePlan = {
  phase: Phase
  schedule: DaySchedule[]
}

export type TrainingPlan = {
  routeFeatures: RouteFeatures
  trainingDays: Weekday[]
  phases: PhasePlan[]
}

export type ProgressSink = (phasesCompleted: number, phasesTotal: number) => void

export type AssembleOptions = {
  onProgress?: ProgressSink
  signal?: AbortSignal
}

/** Day as returned by the compositor after the day contract holds. */
export type ComposedDay = {
  day: Weekday
  focus: string
  details: string
}

export type FocusRepair =
  | { kind: 'substituted'; token: string; replacement: string; similarity: number }
  | { kind: 'dropped'; token: string; bestCandidate: string | null; similarity: number }
