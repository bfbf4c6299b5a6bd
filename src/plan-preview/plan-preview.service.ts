import { Inject, Injectable, Logger } from '@nestjs/common'
import { resolveAttributeRatings } from '../climber-profile/climber-profile.parsing'
import type { ClimberProfile } from '../climber-profile/climber-profile.types'
import { CompositorCacheService, hashInput } from '../compositor-cache/compositor-cache.service'
import { stripMarkdownFences } from '../compositor/response-text'
import { COMPOSITOR, type PlanCompositor, type RoutePreviewContext } from '../compositor/compositor.types'
import { ValidationError } from '../errors/plan-generation.errors'
import { summarizeClimber, summarizeRoute } from '../plan-assembler/prompt-context'
import { RouteFeaturesService } from '../route-features/route-features.service'
import type { RouteDescriptor, RouteFeatures } from '../route-features/route-features.types'
import { routePreviewSchema, type RoutePreviewOutput } from './plan-preview.schema'

export const PREVIEW_TEMPERATURE = 0.3

export type PlanPreview = {
  routeFeatures: RouteFeatures
  routeOverview: string
  trainingApproach: string
  cache: 'hit' | 'miss'
}

function describeHolds(f: RouteFeatures): string {
  const holds: string[] = []
  if (f.isCrimpy) holds.push('crimpy')
  if (f.isSlopey) holds.push('slopey')
  if (f.isPockety) holds.push('pockety')
  return holds.length > 0 ? holds.join(', ') : 'varied'
}

export function parseRoutePreview(raw: string): RoutePreviewOutput {
  let json: unknown
  try {
    json = JSON.parse(stripMarkdownFences(raw))
  } catch {
    throw new ValidationError('Compositor returned non-JSON content', 'INVALID_JSON')
  }
  const parsed = routePreviewSchema.safeParse(json)
  if (!parsed.success) {
    throw new ValidationError(
      'Route preview failed schema validation',
      'SCHEMA_VALIDATION_FAILED',
      parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    )
  }
  return parsed.data
}

@Injectable()
export class PlanPreviewService {
  private readonly logger = new Logger(PlanPreviewService.name)

  constructor(
    private readonly routeFeaturesService: RouteFeaturesService,
    private readonly cacheService: CompositorCacheService,
    @Inject(COMPOSITOR) private readonly compositor: PlanCompositor,
  ) {}

  async preview(route: RouteDescriptor, profile: ClimberProfile): Promise<PlanPreview> {
    const features = this.routeFeaturesService.extract(route)
    const context: RoutePreviewContext = {
      route: summarizeRoute(route, features),
      climber: summarizeClimber(profile, resolveAttributeRatings(profile)),
    }
    const inputHash = hashInput({ provider: this.compositor.provider, route, context })

    const cached = this.cacheService.get('route-preview', inputHash)
    if (cached) {
      const out = parseRoutePreview(cached.text)
      return { routeFeatures: features, routeOverview: out.route_overview, trainingApproach: out.training_approach, cache: 'hit' }
    }

    const system =
      'You are an experienced climbing coach. Write two short paragraphs: ' +
      'route_overview describes the style and demands of the route, referring to the angles, holds and length given; ' +
      "training_approach says what a training plan should focus on for this climber. Address the climber as \"you\". " +
      `The route is ${features.isSteep ? 'steep or overhanging' : 'vertical or less'} with ${describeHolds(features)} holds. ` +
      'Return ONLY valid JSON (no markdown, no surrounding text) exactly in this shape: ' +
      '{"route_overview":string,"training_approach":string}.'

    const raw = await this.compositor.compose({
      task: 'route-preview',
      system,
      input: JSON.stringify({ ...context, details: route }),
      temperature: PREVIEW_TEMPERATURE,
      context,
    })
    const out = parseRoutePreview(raw)
    this.cacheService.set('route-preview', inputHash, raw)
    this.logger.log(`Previewed ${route.name ?? features.grade} (${features.primaryStyle})`)

    return { routeFeatures: features, routeOverview: out.route_overview, trainingApproach: out.training_approach, cache: 'miss' }
  }
}
