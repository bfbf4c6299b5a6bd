import { WEEKDAYS, type Weekday } from './phase-structure.types'

// Fewest back-to-back days possible inside a Monday-Sunday week.
const TRAINING_DAYS: Readonly<Record<number, readonly Weekday[]>> = {
  2: ['Tuesday', 'Friday'],
  3: ['Monday', 'Wednesday', 'Friday'],
  4: ['Monday', 'Wednesday', 'Friday', 'Sunday'],
  5: ['Monday', 'Tuesday', 'Thursday', 'Friday', 'Sunday'],
  6: ['Monday', 'Tuesday', 'Wednesday', 'Friday', 'Saturday', 'Sunday'],
}

const DEFAULT_SESSIONS = 3

export function determineTrainingDays(sessionsPerWeek: number): Weekday[] {
  const days = TRAINING_DAYS[sessionsPerWeek] ?? TRAINING_DAYS[DEFAULT_SESSIONS] ?? []
  return [...days]
}

export function weekdayIndex(day: Weekday): number {
  return WEEKDAYS.indexOf(day)
}

/** Case-insensitive; accepts three-letter abbreviations. */
export function canonicalWeekday(raw: string): Weekday | null {
  const lower = raw.trim().toLowerCase()
  if (lower.length < 3) return null
  return WEEKDAYS.find((d) => d.toLowerCase() === lower || d.toLowerCase().slice(0, 3) === lower) ?? null
}

export function compareWeekdays(a: Weekday, b: Weekday): number {
  return weekdayIndex(a) - weekdayIndex(b)
}
