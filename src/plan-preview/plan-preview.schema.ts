import { z } from 'zod'

export const routePreviewSchema = z.object({
  route_overview: z.string().trim().min(1),
  training_approach: z.string().trim().min(1),
})

export type RoutePreviewOutput = z.infer<typeof routePreviewSchema>
