import { Injectable, Logger } from '@nestjs/common'
import { analyzeNeeds } from '../climber-profile/climber-profile.parsing'
import type { AttributeRatings, ClimberNeeds, ClimberProfile } from '../climber-profile/climber-profile.types'
import type { RouteFeatures } from '../route-features/route-features.types'
import type { Phase, PhaseEmphasis, PhaseStructure, PhaseType } from './phase-structure.types'
import { determineTrainingDays } from './training-days'

type PhaseBlueprint = {
  title: string
  type: PhaseType
  weeks: number
  description: string
  emphasis: PhaseEmphasis
}

type RouteDemand = {
  endurance: boolean
  power: boolean
}

export function formatWeekRange(start: number, end: number): string {
  return start === end ? `Week ${start}` : `Weeks ${start}-${end}`
}

/** Lays the blueprints end to end and names each one after its week range. */
export function layoutPhases(blueprints: PhaseBlueprint[]): Phase[] {
  let start = 1
  return blueprints.map((bp) => {
    const end = start + bp.weeks - 1
    const phase: Phase = {
      name: `${bp.title} (${formatWeekRange(start, end)})`,
      type: bp.type,
      weeks: bp.weeks,
      description: bp.description,
      emphasis: bp.emphasis,
    }
    start = end + 1
    return phase
  })
}

function shortPlan(weeks: number, needs: ClimberNeeds, route: RouteDemand): PhaseBlueprint[] {
  if (route.endurance && !needs.strength) {
    return [
      {
        title: 'Power-Endurance Focus',
        type: 'peak',
        weeks,
        description: 'Compressed preparation on route-specific endurance with minimal strength work',
        emphasis: 'power_endurance',
      },
    ]
  }
  if (route.power || needs.strength) {
    return [
      {
        title: 'Strength & Power',
        type: 'base',
        weeks,
        description: 'Intensive strength and power development for short-term gains',
        emphasis: 'strength',
      },
    ]
  }
  return [
    {
      title: 'Integrated Training',
      type: 'base',
      weeks,
      description: 'Combined strength and endurance work for well-rounded preparation',
      emphasis: 'balanced',
    },
  ]
}

function mediumPlan(weeks: number, needs: ClimberNeeds, route: RouteDemand): PhaseBlueprint[] {
  const half = Math.floor(weeks / 2)

  if (route.endurance && needs.endurance) {
    const base = weeks <= 6 ? half : 3
    return [
      {
        title: 'Aerobic Base Building',
        type: 'base',
        weeks: base,
        description:
          'Build aerobic capacity and climbing volume: continuous climbing and ARC work on an endurance foundation while keeping finger strength',
        emphasis: 'endurance',
      },
      {
        title: 'Power-Endurance Development',
        type: 'peak',
        weeks: weeks - base,
        description: 'Move to route-specific power-endurance with 4x4s, intervals and sustained climbing at higher intensity',
        emphasis: 'power_endurance',
      },
    ]
  }

  if (route.endurance && !needs.strength) {
    return [
      {
        title: 'Base Conditioning',
        type: 'base',
        weeks: half,
        description: 'Build aerobic capacity and refine movement efficiency',
        emphasis: 'endurance',
      },
      {
        title: 'Route-Specific Endurance',
        type: 'peak',
        weeks: weeks - half,
        description: 'Move to route-specific power-endurance and pacing',
        emphasis: 'power_endurance',
      },
    ]
  }

  if (route.power || needs.strength) {
    return [
      {
        title: 'Strength & Power',
        type: 'base',
        weeks: half,
        description: 'Maximum strength and power development',
        emphasis: 'strength',
      },
      {
        title: 'Power Application',
        type: 'peak',
        weeks: weeks - half,
        description: 'Convert raw strength into climbing-specific power',
        emphasis: 'power',
      },
    ]
  }

  return [
    {
      title: 'Foundation',
      type: 'base',
      weeks: half,
      description: 'Build a strength base while maintaining endurance',
      emphasis: 'balanced',
    },
    {
      title: 'Route Preparation',
      type: 'peak',
      weeks: weeks - half,
      description: 'Shift focus to route-specific demands',
      emphasis: 'balanced',
    },
  ]
}

function longPlan(weeks: number, needs: ClimberNeeds, route: RouteDemand): PhaseBlueprint[] {
  const taperWeeks = weeks >= 10 ? 1 : 0
  const remaining = weeks - taperWeeks
  const blueprints: PhaseBlueprint[] = []

  if (route.endurance && !needs.strength) {
    if (remaining >= 12) {
      const quarter = Math.floor(remaining / 4)
      blueprints.push(
        {
          title: 'Aerobic Base',
          type: 'base',
          weeks: quarter,
          description: 'Develop foundational aerobic capacity',
          emphasis: 'endurance',
        },
        {
          title: 'Volume Building',
          type: 'base',
          weeks: quarter,
          description: 'Increase climbing volume and work capacity',
          emphasis: 'endurance',
        },
        {
          title: 'Power-Endurance',
          type: 'peak',
          weeks: quarter,
          description: 'Develop sustained power output',
          emphasis: 'power_endurance',
        },
        {
          title: 'Route Simulation',
          type: 'peak',
          weeks: remaining - 3 * quarter,
          description: 'Route-specific preparation and tactics',
          emphasis: 'power_endurance',
        },
      )
    } else {
      const base = Math.floor((remaining * 4) / 10)
      const build = Math.floor((remaining * 3) / 10)
      blueprints.push(
        {
          title: 'Base Phase',
          type: 'base',
          weeks: base,
          description: 'Aerobic development and movement quality',
          emphasis: 'endurance',
        },
        {
          title: 'Build Phase',
          type: 'base',
          weeks: build,
          description: 'Raise intensity and introduce power-endurance',
          emphasis: 'power_endurance',
        },
        {
          title: 'Peak Phase',
          type: 'peak',
          weeks: remaining - base - build,
          description: 'Route-specific fitness and performance',
          emphasis: 'power_endurance',
        },
      )
    }
  } else {
    const base = Math.floor((remaining * 4) / 10)
    const transition = Math.floor((remaining * 2) / 10)
    blueprints.push(
      {
        title: 'Strength & Power',
        type: 'base',
        weeks: base,
        description: 'Maximum strength and power development',
        emphasis: 'strength',
      },
      {
        title: 'Power-Endurance Transition',
        type: 'base',
        weeks: transition,
        description: 'Bridge strength gains into climbing fitness',
        emphasis: 'power_endurance',
      },
      {
        title: 'Route-Specific Preparation',
        type: 'peak',
        weeks: remaining - base - transition,
        description: 'Apply fitness to route-specific demands',
        emphasis: 'balanced',
      },
    )
  }

  if (taperWeeks > 0) {
    blueprints.push({
      title: 'Taper & Peak',
      type: 'taper',
      weeks: taperWeeks,
      description: 'Reduce volume by 40-50%, maintain intensity, optimize for performance',
      emphasis: 'taper',
    })
  }

  return blueprints
}

export function normalizeWeeks(weeks: number): number {
  return Number.isFinite(weeks) ? Math.max(1, Math.floor(weeks)) : 1
}

/**
 * Splits the training block into phases. Never empty; phase weeks always
 * add up to the (floored, at least 1) requested week count and a taper, if
 * any, comes last.
 */
export function determinePhases(
  profile: ClimberProfile,
  weeks: number,
  sessionsPerWeek: number,
  features: RouteFeatures,
  ratings: AttributeRatings,
): PhaseStructure {
  const total = normalizeWeeks(weeks)
  const needs = analyzeNeeds(profile, ratings)
  const route: RouteDemand = { endurance: features.isEndurance, power: features.isPower }

  let blueprints: PhaseBlueprint[]
  if (total <= 4) blueprints = shortPlan(total, needs, route)
  else if (total <= 8) blueprints = mediumPlan(total, needs, route)
  else blueprints = longPlan(total, needs, route)

  return {
    phases: layoutPhases(blueprints),
    trainingDays: determineTrainingDays(sessionsPerWeek),
  }
}

@Injectable()
export class PhaseStructureService {
  private readonly logger = new Logger(PhaseStructureService.name)

  determinePhases(
    profile: ClimberProfile,
    weeks: number,
    sessionsPerWeek: number,
    features: RouteFeatures,
    ratings: AttributeRatings,
  ): PhaseStructure {
    const structure = determinePhases(profile, weeks, sessionsPerWeek, features, ratings)
    this.logger.log(`Phase structure for ${weeks} week(s): ${structure.phases.map((p) => p.name).join(' | ')}`)
    return structure
  }
}
