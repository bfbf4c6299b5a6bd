import { z } from 'zod'

export const composedDaySchema = z.object({
  day: z.string().trim().min(1),
  focus: z.string().trim().min(1),
  details: z.string(),
})

export const weeklyScheduleSchema = z.object({
  weekly_schedule: z.array(composedDaySchema).min(1),
})

export type WeeklyScheduleOutput = z.infer<typeof weeklyScheduleSchema>

const weekdaySchema = z.enum(['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday'])

export const planArtifactSchema = z.object({
  phases: z
    .array(
      z.object({
        phase_name: z.string().min(1),
        description: z.string(),
        weekly_schedule: z.array(
          z.object({
            day: weekdaySchema,
            focus: z.string(),
            details: z.string(),
            exercises: z.array(z.object({ name: z.string(), details: z.string() })).optional(),
          }),
        ),
      }),
    )
    .min(1),
})

export type PlanArtifact = z.infer<typeof planArtifactSchema>

export const intensityRanksSchema = z.object({
  defaultRank: z.number().int(),
  ranks: z.record(z.string(), z.number().int()),
})

export type IntensityRanks = z.infer<typeof intensityRanksSchema>
