import {
  collectStrengths,
  collectWeaknesses,
  parseSessionMinutes,
  resolveExperienceLevel,
} from '../climber-profile/climber-profile.parsing'
import type { AttributeRatings, ClimberProfile } from '../climber-profile/climber-profile.types'
import type { ClimberSummary, PromptExercise, RouteSummary } from '../compositor/compositor.types'
import type { RankedExercise } from '../exercise-filter/exercise-filter.types'
import type { RouteDescriptor, RouteFeatures } from '../route-features/route-features.types'

export function summarizeClimber(profile: ClimberProfile, ratings: AttributeRatings): ClimberSummary {
  return {
    ...(profile.currentGrade ? { currentGrade: profile.currentGrade } : {}),
    ...(profile.maxBoulderGrade ? { maxBoulderGrade: profile.maxBoulderGrade } : {}),
    experienceLevel: resolveExperienceLevel(profile),
    sessionMinutes: parseSessionMinutes(profile.sessionTime),
    strengths: collectStrengths(profile, ratings),
    weaknesses: collectWeaknesses(profile, ratings),
    ...(profile.injuries ? { injuries: profile.injuries } : {}),
    ...(profile.notes ? { notes: profile.notes } : {}),
  }
}

export function summarizeRoute(route: RouteDescriptor, features: RouteFeatures): RouteSummary {
  return {
    ...(route.name ? { name: route.name } : {}),
    grade: features.grade,
    ...(route.crag ? { crag: route.crag } : {}),
    primaryStyle: features.primaryStyle,
    keyChallenges: [...features.keyChallenges],
  }
}

export function toPromptExercise(ex: RankedExercise): PromptExercise {
  return {
    name: ex.name,
    category: ex.category,
    timeRequired: ex.timeRequired,
    priority: ex.priority,
    ...(ex.compatibleWith && ex.compatibleWith.length > 0 ? { compatibleWith: [...ex.compatibleWith] } : {}),
    ...(ex.notes && ex.notes.length > 0 ? { notes: [...ex.notes] } : {}),
  }
}
