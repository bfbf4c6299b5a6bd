import { Injectable } from '@nestjs/common'
import { DESCRIPTION_KEYWORDS, STYLE_TOKENS } from './description-keywords'
import type { RouteDescriptor, RouteFeatures, RouteFlag, RouteFlags } from './route-features.types'

export type RouteStyleHint = {
  style?: string
}

function emptyFlags(): RouteFlags {
  return {
    isSteep: false,
    isTechnical: false,
    isEndurance: false,
    isPower: false,
    isCrimpy: false,
    isSlopey: false,
    isPockety: false,
    isPumpy: false,
    isSustained: false,
    isBouldery: false,
    isDynamic: false,
  }
}

function tokens(list: readonly string[] | undefined): Set<string> {
  return new Set((list ?? []).map((t) => t.trim().toLowerCase()).filter((t) => t.length > 0))
}

function hasAny(set: Set<string>, ...candidates: string[]): boolean {
  return candidates.some((c) => set.has(c))
}

export function resolvePrimaryStyle(flags: RouteFlags): string {
  if (flags.isSteep && flags.isPower) return 'powerful overhanging'
  if (flags.isSteep && flags.isEndurance) return 'endurance overhanging'
  if (flags.isTechnical && !flags.isSteep) return 'technical face'
  if (flags.isEndurance && !flags.isSteep) return 'sustained vertical'
  if (flags.isCrimpy && flags.isTechnical) return 'technical crimping'
  if (flags.isPockety) return 'pocket-intensive'
  if (flags.isPumpy) return 'pumpy'
  if (flags.isBouldery) return 'bouldery'
  return 'mixed'
}

/**
 * Derives route flags and challenge tags from the descriptor. Pure: the
 * same descriptor always yields an equal result.
 */
export function extractRouteFeatures(route: RouteDescriptor, hint?: RouteStyleHint): RouteFeatures {
  const flags = emptyFlags()
  const challenges: string[] = []

  const mark = (flagList: readonly RouteFlag[], challenge?: string) => {
    for (const flag of flagList) flags[flag] = true
    if (challenge && !challenges.includes(challenge)) challenges.push(challenge)
  }

  const style = (hint?.style ?? route.style ?? '').trim().toLowerCase()
  const styleRule = style ? STYLE_TOKENS[style] : undefined
  if (styleRule) mark(styleRule.flags, styleRule.challenge)

  const angles = tokens(route.angles)
  if (hasAny(angles, 'overhanging', 'overhang', 'roof')) mark(['isSteep'], 'steepness')
  if (angles.has('slab')) mark(['isTechnical'], 'technical movement')

  const lengths = tokens(route.lengths)
  if (lengths.has('long')) mark(['isEndurance'], 'endurance')
  if (hasAny(lengths, 'short', 'bouldery')) mark(['isPower'], 'power')

  const holds = tokens(route.holdTypes)
  if (hasAny(holds, 'crimpy', 'crimps', 'crack')) mark(['isCrimpy'], 'small holds')
  if (hasAny(holds, 'slopers', 'slopey')) mark(['isSlopey'], 'slopers')
  if (hasAny(holds, 'pockets', 'pockety')) mark(['isPockety'], 'pockets')
  if (holds.has('pinches')) mark([], 'pinches')

  const description = (route.description ?? '').toLowerCase()
  if (description.length > 0) {
    for (const rule of DESCRIPTION_KEYWORDS) {
      if (rule.keywords.some((kw) => description.includes(kw))) mark([rule.flag], rule.challenge)
    }
  }

  return {
    ...flags,
    primaryStyle: style || resolvePrimaryStyle(flags),
    keyChallenges: challenges,
    grade: (route.grade ?? '').trim(),
  }
}

@Injectable()
export class RouteFeaturesService {
  extract(route: RouteDescriptor, hint?: RouteStyleHint): RouteFeatures {
    return extractRouteFeatures(route, hint)
  }
}
