import type { PromptExercise, RoutePreviewContext, WeeklyScheduleContext, CompositionRequest, PlanCompositor } from './compositor.types'

// Builds deterministic output from the structured context; the prompt text is ignored.
export class StubCompositor implements PlanCompositor {
  readonly provider = 'stub' as const

  async compose(request: CompositionRequest): Promise<string> {
    if (request.task === 'route-preview') {
      return JSON.stringify(buildPreview(request.context))
    }
    return JSON.stringify(buildWeeklySchedule(request.context))
  }
}

function buildWeeklySchedule(ctx: WeeklyScheduleContext) {
  const warmUp = ctx.exercises.find((e) => e.category === 'warm_up')
  const main = ctx.exercises.filter((e) => e.category !== 'warm_up' && e.category !== 'cool_down')
  const pool = main.length > 0 ? main : ctx.exercises

  return {
    weekly_schedule: ctx.trainingDays.map((day, i) => {
      const picked: PromptExercise[] = []
      if (warmUp) picked.push(warmUp)
      const first = pool[i % Math.max(pool.length, 1)]
      if (first) picked.push(first)
      const second = pool.length > 1 ? pool[(i + 1) % pool.length] : undefined
      if (second) picked.push(second)

      if (picked.length === 0) {
        return { day, focus: 'Climbing session', details: `${ctx.phase.name}: free climbing at easy grades.` }
      }
      return {
        day,
        focus: picked.map((e) => e.name).join(' + '),
        details: picked.map((e) => `${e.name}: ${e.timeRequired} min block.`).join(' '),
      }
    }),
  }
}

function buildPreview(ctx: RoutePreviewContext) {
  const { route, climber } = ctx
  const label = route.name ? `${route.name} (${route.grade})` : route.grade
  const challenges = route.keyChallenges.length > 0 ? route.keyChallenges.join(', ') : 'general movement'
  const weaknesses = climber.weaknesses.length > 0 ? climber.weaknesses.join(', ') : 'no reported weaknesses'

  return {
    route_overview: `${label} is a ${route.primaryStyle} route. Key challenges: ${challenges}.`,
    training_approach: `Train for ${route.primaryStyle} at ${climber.experienceLevel} level, addressing ${weaknesses}, within ${climber.sessionMinutes}-minute sessions.`,
  }
}
