import { ValidationError } from '../errors/plan-generation.errors'
import type { Weekday } from '../phase-structure/phase-structure.types'
import { parseComposedSchedule } from './weekly-schedule.parser'

const days: Weekday[] = ['Tuesday', 'Friday']

function schedule(entries: Array<{ day: string; focus?: string; details?: string }>): string {
  return JSON.stringify({
    weekly_schedule: entries.map((e) => ({ focus: 'Plank', details: 'Three holds.', ...e })),
  })
}

function captureError(fn: () => unknown): ValidationError {
  try {
    fn()
  } catch (err) {
    if (err instanceof ValidationError) return err
    throw err
  }
  throw new Error('expected a ValidationError')
}

describe('parseComposedSchedule', () => {
  it('strips fences and canonicalises day names', () => {
    const raw = '```json\n' + schedule([{ day: 'tuesday' }, { day: 'FRI' }]) + '\n```'

    expect(parseComposedSchedule(raw, days)).toEqual([
      { day: 'Tuesday', focus: 'Plank', details: 'Three holds.' },
      { day: 'Friday', focus: 'Plank', details: 'Three holds.' },
    ])
  })

  it('rejects non-JSON text', () => {
    expect(captureError(() => parseComposedSchedule('Here is your plan!', days)).code).toBe('INVALID_JSON')
  })

  it('rejects a day without focus', () => {
    const raw = JSON.stringify({ weekly_schedule: [{ day: 'Tuesday', details: 'x' }] })
    expect(captureError(() => parseComposedSchedule(raw, days)).code).toBe('SCHEMA_VALIDATION_FAILED')
  })

  it('rejects days outside the training set', () => {
    const err = captureError(() => parseComposedSchedule(schedule([{ day: 'Tuesday' }, { day: 'Monday' }]), days))
    expect(err.code).toBe('DAY_CONTRACT_VIOLATED')
    expect(err.issues).toEqual(['Monday is not a training day'])
  })

  it('rejects repeated days', () => {
    const err = captureError(() => parseComposedSchedule(schedule([{ day: 'Tuesday' }, { day: 'tue' }]), days))
    expect(err.issues).toEqual(['Tuesday listed more than once'])
  })

  it('rejects the wrong number of sessions', () => {
    const err = captureError(() => parseComposedSchedule(schedule([{ day: 'Friday' }]), days))
    expect(err.issues).toEqual(['expected 2 day(s), got 1'])
    expect(err.isRetryable).toBe(true)
  })
})
