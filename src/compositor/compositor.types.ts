import type { ExerciseCategory, ExercisePriority } from '../exercise-catalog/exercise-catalog.types'
import type { PhaseEmphasis, PhaseType, Weekday } from '../phase-structure/phase-structure.types'

export const COMPOSITOR = Symbol('COMPOSITOR')

export type PromptExercise = {
  name: string
  category: ExerciseCategory
  timeRequired: number
  priority: ExercisePriority
  compatibleWith?: string[]
  notes?: string[]
}

export type RouteSummary = {
  name?: string
  grade: string
  crag?: string
  primaryStyle: string
  keyChallenges: string[]
}

export type ClimberSummary = {
  currentGrade?: string
  maxBoulderGrade?: string
  experienceLevel: string
  sessionMinutes: number
  strengths: string[]
  weaknesses: string[]
  injuries?: string
  notes?: string
}

export type WeeklyScheduleContext = {
  phase: {
    index: number
    total: number
    name: string
    type: PhaseType
    weeks: number
    description: string
    emphasis?: PhaseEmphasis
  }
  sessionsPerWeek: number
  trainingDays: Weekday[]
  exercises: PromptExercise[]
  route: RouteSummary
  climber: ClimberSummary
  previousAnalysis?: string
}

export type RoutePreviewContext = {
  route: RouteSummary
  climber: ClimberSummary
}

type BaseRequest = {
  system: string
  input: string
  temperature: number
}

export type CompositionRequest =
  | (BaseRequest & { task: 'weekly-schedule'; context: WeeklyScheduleContext })
  | (BaseRequest & { task: 'route-preview'; context: RoutePreviewContext })

/** Turns a rendered prompt into raw text. Callers strip fences and validate. */
export interface PlanCompositor {
  readonly provider: 'stub' | 'openai'
  compose(request: CompositionRequest): Promise<string>
}
