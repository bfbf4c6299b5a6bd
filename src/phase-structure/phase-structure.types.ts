export type PhaseType = 'base' | 'peak' | 'taper'

export type PhaseEmphasis = 'strength' | 'power' | 'endurance' | 'power_endurance' | 'balanced' | 'taper'

export type Weekday = 'Monday' | 'Tuesday' | 'Wednesday' | 'Thursday' | 'Friday' | 'Saturday' | 'Sunday'

export const WEEKDAYS: readonly Weekday[] = ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday']

export type Phase = {
  name: string
  type: PhaseType
  weeks: number
  description: string
  emphasis?: PhaseEmphasis
}

export type PhaseStructure = {
  phases: Phase[]
  trainingDays: Weekday[]
}
