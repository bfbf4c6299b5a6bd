import { Inject, Injectable, Logger, Optional } from '@nestjs/common'
import {
  parseBoulderGrade,
  parseSessionMinutes,
  collectWeaknesses,
  resolveAttributeRatings,
  resolveAvailableFacilities,
  resolveExperienceLevel,
} from '../climber-profile/climber-profile.parsing'
import type { AttributeRatings, ClimberProfile, ExperienceLevel } from '../climber-profile/climber-profile.types'
import { EXERCISE_CATEGORIES, type ExerciseDef } from '../exercise-catalog/exercise-catalog.types'
import type { RouteFeatures } from '../route-features/route-features.types'
import {
  CAMPUS_MIN_AGE,
  CAMPUS_MIN_BOULDER_GRADE,
  CRITICAL_SYSTEMS,
  DEFAULT_PHASE_BIAS,
  DEFAULT_RANKING_LIMITS,
  ENDURANCE_CATEGORIES,
  ESSENTIAL_EXERCISES,
  MAX_HANG_MIN_BOULDER_GRADE,
  POWER_CATEGORIES,
  SCORE,
  SHORT_EXERCISE_MINUTES,
  WEAKNESS_CATEGORIES,
} from './exercise-filter.config'
import type {
  CategoryWeights,
  PhaseBiasConfig,
  PhaseContext,
  RankedExercise,
  RankingLimits,
  WeightAdjustment,
} from './exercise-filter.types'

export const PHASE_BIAS = Symbol('PHASE_BIAS')

export type FilterOptions = {
  bias?: PhaseBiasConfig
  limits?: RankingLimits
  onExclude?: (exercise: ExerciseDef, reason: string) => void
}

type FilterContext = {
  facilities: Set<string>
  sessionMinutes: number
  level: ExperienceLevel
  boulderGrade: number | null
  age: number | null
  ratings: AttributeRatings
  weaknesses: string[]
  features: RouteFeatures
}

function buildContext(profile: ClimberProfile, features: RouteFeatures): FilterContext {
  const ratings = resolveAttributeRatings(profile)
  return {
    facilities: resolveAvailableFacilities(profile.facilities),
    sessionMinutes: parseSessionMinutes(profile.sessionTime),
    level: resolveExperienceLevel(profile),
    boulderGrade: parseBoulderGrade(profile.maxBoulderGrade),
    age: typeof profile.age === 'number' && Number.isFinite(profile.age) ? profile.age : null,
    ratings,
    weaknesses: collectWeaknesses(profile, ratings),
    features,
  }
}

export function isCampusExercise(name: string): boolean {
  const lower = name.toLowerCase()
  return lower.includes('campus') && !lower.includes('foot-on')
}

export function isMaxHangExercise(name: string): boolean {
  return name.toLowerCase().includes('max hangs')
}

export function isPocketExercise(name: string): boolean {
  return name.toLowerCase().includes('pocket')
}

/** Returns why the exercise is not allowed, or null when it passes every hard constraint. */
function exclusionReason(ex: ExerciseDef, ctx: FilterContext): string | null {
  const missing = ex.requiredFacilities.filter((f) => !ctx.facilities.has(f))
  if (missing.length > 0) return `missing facilities: ${missing.join(', ')}`

  if (ex.timeRequired > ctx.sessionMinutes) {
    return `takes ${ex.timeRequired} min, session is ${ctx.sessionMinutes} min`
  }

  const grade = ctx.boulderGrade ?? 0
  if (isCampusExercise(ex.name)) {
    if (ctx.age !== null && ctx.age < CAMPUS_MIN_AGE) return 'campus board under 18'
    if (ctx.level === 'beginner' || grade < CAMPUS_MIN_BOULDER_GRADE) return 'campus board needs advanced level'
  }

  if (isMaxHangExercise(ex.name) && (ctx.level === 'beginner' || grade < MAX_HANG_MIN_BOULDER_GRADE)) {
    return 'max hangs need more experience'
  }

  if (isPocketExercise(ex.name) && !ctx.features.isPockety) return 'pocket-specific, route has no pockets'

  return null
}

function applyAdjustment(weights: CategoryWeights, adjustment: WeightAdjustment | undefined): CategoryWeights {
  if (!adjustment) return weights
  const next: CategoryWeights = { ...weights }
  for (const category of EXERCISE_CATEGORIES) {
    const delta = adjustment.add?.[category]
    if (delta !== undefined) next[category] = (next[category] ?? 0) + delta
  }
  return { ...next, ...adjustment.set }
}

export function computePhaseWeights(
  phase: PhaseContext | undefined,
  features: RouteFeatures,
  ratings: AttributeRatings,
  bias: PhaseBiasConfig = DEFAULT_PHASE_BIAS,
): CategoryWeights {
  if (!phase) return {}
  const weights: CategoryWeights = { ...bias.phases[phase.type] }

  if (features.isEndurance) {
    if ((ratings.endurance ?? 3) <= 2) return applyAdjustment(weights, bias.enduranceWeakness[phase.type])
  } else if (features.isPower) {
    if ((ratings.power ?? 3) <= 2) return applyAdjustment(weights, bias.powerWeakness[phase.type])
  }
  return weights
}

function essentialTable(features: RouteFeatures): Readonly<Record<string, number>> {
  if (features.isEndurance) return ESSENTIAL_EXERCISES.endurance
  if (features.isPower) return ESSENTIAL_EXERCISES.power
  return ESSENTIAL_EXERCISES.balanced
}

function routeMatchScore(ex: ExerciseDef, features: RouteFeatures): number {
  let score = 0
  if (features.isEndurance && ENDURANCE_CATEGORIES.includes(ex.category)) score += SCORE.routeMatch
  if (features.isPower && POWER_CATEGORIES.includes(ex.category)) score += SCORE.routeMatch
  if (features.isTechnical && ex.category === 'technique') score += SCORE.routeMatch
  if (features.isPockety && isPocketExercise(ex.name)) score += SCORE.routeMatch
  return score
}

function weaknessScore(ex: ExerciseDef, weaknesses: string[]): number {
  for (const [keyword, categories] of WEAKNESS_CATEGORIES) {
    if (weaknesses.some((w) => w.includes(keyword))) {
      if (categories.includes(ex.category)) return SCORE.weaknessMatch
    }
  }
  return 0
}

function experienceScore(ex: ExerciseDef, level: ExperienceLevel): number {
  if (level === 'beginner' && (ex.category === 'technique' || ex.category === 'aerobic_capacity')) return SCORE.experience
  if (level === 'advanced' && (ex.category === 'strength' || ex.category === 'power')) return SCORE.experience
  return 0
}

function scoreExercise(ex: ExerciseDef, ctx: FilterContext, weights: CategoryWeights): number {
  let score = routeMatchScore(ex, ctx.features)
  score += weaknessScore(ex, ctx.weaknesses)
  score += essentialTable(ctx.features)[ex.name] ?? 0
  score += ex.priority === 'high' ? SCORE.priorityHigh : SCORE.priorityMedium
  score += experienceScore(ex, ctx.level)
  if (ex.timeRequired < SHORT_EXERCISE_MINUTES) score += SCORE.shortExercise
  score += weights[ex.category] ?? 0
  return score
}

function phaseNotes(ex: ExerciseDef, phase: PhaseContext | undefined, features: RouteFeatures): string[] {
  const notes: string[] = []
  if (phase?.type === 'taper') notes.push(`taper week${phase.weeks > 1 ? 's' : ''}: cut volume 40-50%, keep intensity`)
  if (features.isPockety && isPocketExercise(ex.name)) notes.push('pocket focus: include two- and three-finger pockets')
  return notes
}

function copy(ex: ExerciseDef, score: number, notes: string[]): RankedExercise {
  return {
    ...ex,
    requiredFacilities: [...ex.requiredFacilities],
    ...(ex.compatibleWith ? { compatibleWith: [...ex.compatibleWith] } : {}),
    score,
    ...(notes.length > 0 ? { notes } : {}),
  }
}

/**
 * Filters the catalog down to exercises the climber can do and ranks them
 * for the route and phase. Only positive scores rank; a short list is
 * topped up from the remaining eligible exercises at score 0.
 */
export function filterAndRank(
  catalog: readonly ExerciseDef[],
  profile: ClimberProfile,
  features: RouteFeatures,
  phase?: PhaseContext,
  options: FilterOptions = {},
): RankedExercise[] {
  const limits = options.limits ?? DEFAULT_RANKING_LIMITS
  const ctx = buildContext(profile, features)
  const weights = computePhaseWeights(phase, features, ctx.ratings, options.bias)

  const ranked: RankedExercise[] = []
  const leftovers: ExerciseDef[] = []

  for (const ex of catalog) {
    const reason = exclusionReason(ex, ctx)
    if (reason) {
      options.onExclude?.(ex, reason)
      continue
    }
    const score = scoreExercise(ex, ctx, weights)
    if (score > 0) ranked.push(copy(ex, score, phaseNotes(ex, phase, features)))
    else leftovers.push(ex)
  }

  ranked.sort((a, b) => b.score - a.score)

  const isTaper = phase?.type === 'taper'
  const result = isTaper ? ranked.slice(0, limits.taperCap) : ranked
  const target = isTaper ? limits.taperCap : limits.backfillTarget

  if (result.length < limits.minRanked) {
    const familiar = new Set(result.map((e) => e.category))
    for (const ex of leftovers) {
      if (result.length >= target) break
      if (isTaper && !familiar.has(ex.category)) continue
      result.push(copy(ex, 0, ['backfill', ...phaseNotes(ex, phase, features)]))
    }
  }

  return result
}

/**
 * Trims a ranked list for a prompt: the best exercise of each critical
 * energy system is kept first, the rest filled by score.
 */
export function selectForPrompt(ranked: readonly RankedExercise[], limit: number): RankedExercise[] {
  const picked = new Set<RankedExercise>()

  for (const system of CRITICAL_SYSTEMS) {
    if (picked.size >= limit) break
    const best = ranked.find((e) => e.category === system)
    if (best) picked.add(best)
  }
  for (const ex of ranked) {
    if (picked.size >= limit) break
    picked.add(ex)
  }

  return ranked.filter((e) => picked.has(e))
}

@Injectable()
export class ExerciseFilterService {
  private readonly logger = new Logger(ExerciseFilterService.name)
  private readonly bias: PhaseBiasConfig

  constructor(@Optional() @Inject(PHASE_BIAS) bias?: PhaseBiasConfig) {
    this.bias = bias ?? DEFAULT_PHASE_BIAS
  }

  filterAndRank(
    catalog: readonly ExerciseDef[],
    profile: ClimberProfile,
    features: RouteFeatures,
    phase?: PhaseContext,
  ): RankedExercise[] {
    const ranked = filterAndRank(catalog, profile, features, phase, {
      bias: this.bias,
      onExclude: (ex, reason) => this.logger.debug(`Skipping ${ex.name}: ${reason}`),
    })
    this.logger.debug(
      `Ranked ${ranked.length} of ${catalog.length} exercises${phase ? ` for ${phase.type} phase (${phase.weeks} wk)` : ''}`,
    )
    return ranked
  }

  selectForPrompt(ranked: readonly RankedExercise[], limit: number): RankedExercise[] {
    return selectForPrompt(ranked, limit)
  }
}
