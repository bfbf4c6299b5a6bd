import { stripMarkdownFences } from '../compositor/response-text'
import { ValidationError } from '../errors/plan-generation.errors'
import { canonicalWeekday } from '../phase-structure/training-days'
import type { Weekday } from '../phase-structure/phase-structure.types'
import { weeklyScheduleSchema } from './plan-assembler.schema'
import type { ComposedDay } from './plan-assembler.types'

/**
 * Parses compositor text into days and enforces the day contract: one entry
 * per training day, each day from the scheduled set, no repeats.
 */
export function parseComposedSchedule(raw: string, trainingDays: readonly Weekday[]): ComposedDay[] {
  let json: unknown
  try {
    json = JSON.parse(stripMarkdownFences(raw))
  } catch {
    throw new ValidationError('Compositor returned non-JSON content', 'INVALID_JSON')
  }

  const parsed = weeklyScheduleSchema.safeParse(json)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
    throw new ValidationError('Compositor output failed schema validation', 'SCHEMA_VALIDATION_FAILED', issues)
  }

  const allowed = new Set<Weekday>(trainingDays)
  const seen = new Set<Weekday>()
  const issues: string[] = []
  const days: ComposedDay[] = []

  for (const entry of parsed.data.weekly_schedule) {
    const day = canonicalWeekday(entry.day)
    if (!day) {
      issues.push(`unknown day "${entry.day}"`)
      continue
    }
    if (!allowed.has(day)) {
      issues.push(`${day} is not a training day`)
      continue
    }
    if (seen.has(day)) {
      issues.push(`${day} listed more than once`)
      continue
    }
    seen.add(day)
    days.push({ day, focus: entry.focus, details: entry.details })
  }

  if (issues.length === 0 && days.length !== trainingDays.length) {
    issues.push(`expected ${trainingDays.length} day(s), got ${days.length}`)
  }
  if (issues.length > 0) {
    throw new ValidationError(`Weekly schedule breaks the day contract: ${issues.join('; ')}`, 'DAY_CONTRACT_VIOLATED', issues)
  }

  return days
}
