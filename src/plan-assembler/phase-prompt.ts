import type { WeeklyScheduleContext } from '../compositor/compositor.types'

export type RetryHint = {
  reason: string
  allowedNames: string[]
}

export type RenderedPrompt = {
  system: string
  input: string
}

export function renderWeeklySchedulePrompt(context: WeeklyScheduleContext, retry?: RetryHint): RenderedPrompt {
  const { phase, trainingDays, climber } = context

  let system =
    'You are an experienced climbing coach writing one representative training week for a phase of a plan. ' +
    `Phase ${phase.index + 1} of ${phase.total}: "${phase.name}" (${phase.type}, ${phase.weeks} week(s)). ${phase.description} ` +
    `Schedule exactly ${trainingDays.length} session(s), one on each of: ${trainingDays.join(', ')}. ` +
    'In "focus", use only exact exercise names from the exercises list, joined with " + " when a session combines several. ' +
    'Start each session with a warm-up and order the rest from the most to the least intense. ' +
    `Keep each session within ${climber.sessionMinutes} minutes using the timeRequired values. ` +
    'In "details", describe every exercise in turn, starting with its name, with sets, reps and rest. '

  if (climber.injuries) {
    system += 'Work around the reported injuries. '
  }
  if (context.previousAnalysis) {
    system += 'Stay consistent with the previous analysis given in the input. '
  }

  if (retry) {
    system +=
      `The previous answer was rejected: ${retry.reason}. ` +
      `Allowed focus names: ${retry.allowedNames.map((n) => `"${n}"`).join(', ')}. `
  }

  system +=
    'Return ONLY valid JSON (no markdown, no surrounding text) exactly in this shape: ' +
    '{"weekly_schedule":[{"day":string,"focus":string,"details":string}]}.'

  return { system, input: JSON.stringify(context) }
}
