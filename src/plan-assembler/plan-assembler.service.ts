import { Inject, Injectable, Logger, Optional } from '@nestjs/common'
import { resolveAttributeRatings } from '../climber-profile/climber-profile.parsing'
import type { AttributeRatings } from '../climber-profile/climber-profile.types'
import { COMPOSITOR, type PlanCompositor, type WeeklyScheduleContext } from '../compositor/compositor.types'
import { GenerationCancelledError, GenerationFailedError, isRetryable } from '../errors/plan-generation.errors'
import { ExerciseCatalogService } from '../exercise-catalog/exercise-catalog.service'
import type { ExerciseDef } from '../exercise-catalog/exercise-catalog.types'
import { ExerciseFilterService } from '../exercise-filter/exercise-filter.service'
import { PhaseStructureService } from '../phase-structure/phase-structure.service'
import type { Phase, Weekday } from '../phase-structure/phase-structure.types'
import { compareWeekdays } from '../phase-structure/training-days'
import type { RouteFeatures } from '../route-features/route-features.types'
import { RouteFeaturesService } from '../route-features/route-features.service'
import { decomposeDetails } from './details-decomposer'
import { IntensitySequencer } from './intensity-sequencer'
import { renderWeeklySchedulePrompt, type RetryHint } from './phase-prompt'
import {
  DEFAULT_PLAN_ASSEMBLER_CONFIG,
  PLAN_ASSEMBLER_CONFIG,
  temperatureForAttempt,
  type PlanAssemblerConfig,
} from './plan-assembler.config'
import type { AssembleOptions, ComposedDay, DaySchedule, PhasePlan, PlanRequest, TrainingPlan } from './plan-assembler.types'
import { summarizeClimber, summarizeRoute, toPromptExercise } from './prompt-context'
import { repairFocus } from './vocabulary-repair'
import { parseComposedSchedule } from './weekly-schedule.parser'

type PhaseJob = {
  index: number
  total: number
  phase: Phase
  trainingDays: Weekday[]
  request: PlanRequest
  features: RouteFeatures
  ratings: AttributeRatings
  catalog: readonly ExerciseDef[]
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

export function sortScheduleByWeekday(schedule: readonly DaySchedule[]): DaySchedule[] {
  return [...schedule].sort((a, b) => compareWeekdays(a.day, b.day))
}

@Injectable()
export class PlanAssemblerService {
  private readonly logger = new Logger(PlanAssemblerService.name)
  private readonly config: PlanAssemblerConfig

  constructor(
    private readonly catalogService: ExerciseCatalogService,
    private readonly routeFeaturesService: RouteFeaturesService,
    private readonly phaseStructureService: PhaseStructureService,
    private readonly exerciseFilterService: ExerciseFilterService,
    private readonly sequencer: IntensitySequencer,
    @Inject(COMPOSITOR) private readonly compositor: PlanCompositor,
    @Optional() @Inject(PLAN_ASSEMBLER_CONFIG) config?: PlanAssemblerConfig,
  ) {
    this.config = config ?? DEFAULT_PLAN_ASSEMBLER_CONFIG
  }

  /**
   * Generates every phase in order. A phase that runs out of attempts aborts
   * the whole plan with GenerationFailedError; no partial plan is returned.
   */
  async assemble(request: PlanRequest, options: AssembleOptions = {}): Promise<TrainingPlan> {
    const features = this.routeFeaturesService.extract(request.route)
    const ratings = resolveAttributeRatings(request.profile)
    const { phases, trainingDays } = this.phaseStructureService.determinePhases(
      request.profile,
      request.weeksToTrain,
      request.sessionsPerWeek,
      features,
      ratings,
    )
    const catalog = this.catalogService.getExerciseCatalog()

    const generated: PhasePlan[] = []
    for (const [index, phase] of phases.entries()) {
      if (options.signal?.aborted) {
        throw new GenerationCancelledError(generated.length)
      }

      const schedule = await this.generatePhase({
        index,
        total: phases.length,
        phase,
        trainingDays,
        request,
        features,
        ratings,
        catalog,
      })
      generated.push({ phase, schedule })
      options.onProgress?.(generated.length, phases.length)
    }

    return {
      routeFeatures: features,
      trainingDays,
      phases: generated.map((p) => ({ phase: p.phase, schedule: sortScheduleByWeekday(p.schedule) })),
    }
  }

  private async generatePhase(job: PhaseJob): Promise<DaySchedule[]> {
    const { index, phase } = job
    const ranked = this.exerciseFilterService.filterAndRank(job.catalog, job.request.profile, job.features, {
      type: phase.type,
      weeks: phase.weeks,
    })
    const selected = this.exerciseFilterService.selectForPrompt(ranked, this.config.promptExerciseLimit)
    const validNames = ranked.map((e) => e.name)
    const context = this.buildContext(job, selected.map(toPromptExercise))

    let retry: RetryHint | undefined
    let lastError: unknown
    for (let attempt = 1; attempt <= this.config.maxAttempts; attempt++) {
      const prompt = renderWeeklySchedulePrompt(context, retry)
      try {
        const raw = await this.compositor.compose({
          task: 'weekly-schedule',
          system: prompt.system,
          input: prompt.input,
          temperature: temperatureForAttempt(this.config, attempt),
          context,
        })
        const days = parseComposedSchedule(raw, job.trainingDays)
        return days.map((d) => this.finishDay(d, validNames, phase))
      } catch (err) {
        if (!isRetryable(err)) throw err
        lastError = err
        this.logger.warn(
          `Phase ${index + 1} "${phase.name}" attempt ${attempt}/${this.config.maxAttempts} rejected: ${errorMessage(err)}`,
        )
        retry = { reason: errorMessage(err), allowedNames: validNames.slice(0, this.config.retryNameLimit) }
      }
    }

    const failure = new GenerationFailedError(index, phase.name, this.config.maxAttempts, lastError)
    this.logger.error(failure.message)
    throw failure
  }

  private buildContext(job: PhaseJob, exercises: WeeklyScheduleContext['exercises']): WeeklyScheduleContext {
    const { phase, request } = job
    return {
      phase: {
        index: job.index,
        total: job.total,
        name: phase.name,
        type: phase.type,
        weeks: phase.weeks,
        description: phase.description,
        ...(phase.emphasis ? { emphasis: phase.emphasis } : {}),
      },
      sessionsPerWeek: job.trainingDays.length,
      trainingDays: job.trainingDays,
      exercises,
      route: summarizeRoute(request.route, job.features),
      climber: summarizeClimber(request.profile, job.ratings),
      ...(request.previousAnalysis ? { previousAnalysis: request.previousAnalysis } : {}),
    }
  }

  private finishDay(day: ComposedDay, validNames: readonly string[], phase: Phase): DaySchedule {
    const { names, repairs } = repairFocus(day.focus, validNames)
    for (const r of repairs) {
      if (r.kind === 'substituted') {
        this.logger.warn(`${phase.name} / ${day.day}: "${r.token}" -> "${r.replacement}" (${r.similarity.toFixed(2)})`)
      } else {
        this.logger.warn(`${phase.name} / ${day.day}: dropped "${r.token}" (closest ${r.bestCandidate ?? 'none'})`)
      }
    }

    if (names.length <= 1) {
      return { day: day.day, focus: names, details: day.details }
    }

    const exercises = this.sequencer.order(decomposeDetails(names, day.details), (e) => e.name)
    return {
      day: day.day,
      focus: exercises.map((e) => e.name),
      details: day.details,
      exercises,
    }
  }
}
