import { planArtifactSchema, type PlanArtifact } from './plan-assembler.schema'
import type { TrainingPlan } from './plan-assembler.types'

export const FOCUS_JOINER = ' + '

export function toPlanArtifact(plan: TrainingPlan): PlanArtifact {
  return planArtifactSchema.parse({
    phases: plan.phases.map(({ phase, schedule }) => ({
      phase_name: phase.name,
      description: phase.description,
      weekly_schedule: schedule.map((d) => ({
        day: d.day,
        focus: d.focus.join(FOCUS_JOINER),
        details: d.details,
        ...(d.exercises ? { exercises: d.exercises.map((e) => ({ name: e.name, details: e.details })) } : {}),
      })),
    })),
  })
}
