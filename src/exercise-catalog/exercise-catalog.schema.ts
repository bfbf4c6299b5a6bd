import { z } from 'zod'
import { EXERCISE_CATEGORIES } from './exercise-catalog.types'

export const exerciseDefSchema = z.object({
  name: z.string().trim().min(1),
  category: z.enum(EXERCISE_CATEGORIES),
  priority: z.enum(['high', 'medium']),
  timeRequired: z.number().int().positive(),
  requiredFacilities: z.array(z.string().min(1)),
  compatibleWith: z.array(z.string().min(1)).optional(),
  description: z.string(),
})

export const exerciseCatalogSchema = z
  .array(exerciseDefSchema)
  .min(1)
  .superRefine((entries, ctx) => {
    const seen = new Set<string>()
    entries.forEach((entry, index) => {
      if (seen.has(entry.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [index, 'name'], message: `Duplicate exercise "${entry.name}"` })
      }
      seen.add(entry.name)
    })
  })
