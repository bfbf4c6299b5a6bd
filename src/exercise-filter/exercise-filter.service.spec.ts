import { join } from 'path'
import { resolveAvailableFacilities } from '../climber-profile/climber-profile.parsing'
import type { ClimberProfile } from '../climber-profile/climber-profile.types'
import { ExerciseCatalogService } from '../exercise-catalog/exercise-catalog.service'
import type { ExerciseDef } from '../exercise-catalog/exercise-catalog.types'
import { extractRouteFeatures } from '../route-features/route-features.service'
import type { RouteDescriptor } from '../route-features/route-features.types'
import { DEFAULT_PHASE_BIAS } from './exercise-filter.config'
import { computePhaseWeights, filterAndRank, selectForPrompt } from './exercise-filter.service'
import type { RankedExercise } from './exercise-filter.types'

const route4x4: ExerciseDef = {
  name: 'Route 4x4s',
  category: 'aerobic_capacity',
  priority: 'high',
  timeRequired: 60,
  requiredFacilities: ['lead_wall'],
  description: '',
}
const maxBoulder: ExerciseDef = {
  name: 'Max Boulder Sessions',
  category: 'strength',
  priority: 'high',
  timeRequired: 60,
  requiredFacilities: ['bouldering_wall'],
  description: '',
}
const silentFeet: ExerciseDef = {
  name: 'Silent Feet Drills',
  category: 'technique',
  priority: 'high',
  timeRequired: 10,
  requiredFacilities: ['wall'],
  description: '',
}
const campus: ExerciseDef = {
  name: 'Campus Board Exercises',
  category: 'power',
  priority: 'high',
  timeRequired: 45,
  requiredFacilities: ['campus_board'],
  description: '',
}
const pocketHangs: ExerciseDef = {
  name: 'Fingerboard Max Hangs (Pockets)',
  category: 'strength',
  priority: 'high',
  timeRequired: 30,
  requiredFacilities: ['fingerboard'],
  description: '',
}
const plank: ExerciseDef = {
  name: 'Plank',
  category: 'core',
  priority: 'medium',
  timeRequired: 10,
  requiredFacilities: ['mat'],
  description: '',
}

const small = [route4x4, maxBoulder, silentFeet, campus, pocketHangs, plank]

function summary(list: RankedExercise[]) {
  return list.map((e) => [e.name, e.score])
}

describe('filterAndRank', () => {
  it('applies facility, time and safety constraints before scoring', () => {
    const excluded: string[] = []
    const profile: ClimberProfile = {
      facilities: ['bouldering_wall', 'fingerboard', 'campus_board'],
      sessionTime: '50 minutes',
      experience: 'beginner',
      maxBoulderGrade: 'V6',
    }

    const ranked = filterAndRank(small, profile, extractRouteFeatures({}), undefined, {
      onExclude: (ex, reason) => excluded.push(`${ex.name}: ${reason}`),
    })

    expect(summary(ranked)).toEqual([
      ['Silent Feet Drills', 6],
      ['Plank', 3],
    ])
    expect(excluded).toEqual([
      'Route 4x4s: missing facilities: lead_wall',
      'Max Boulder Sessions: takes 60 min, session is 50 min',
      'Campus Board Exercises: campus board needs advanced level',
      'Fingerboard Max Hangs (Pockets): max hangs need more experience',
    ])
  })

  it('keeps campus work away from climbers under 18 whatever their grade', () => {
    const profile: ClimberProfile = { facilities: ['campus_board'], yearsExperience: 6, maxBoulderGrade: 'V9', age: 16 }
    expect(filterAndRank([campus], profile, extractRouteFeatures({}))).toEqual([])

    const adult = filterAndRank([campus], { ...profile, age: 30 }, extractRouteFeatures({}))
    expect(adult.map((e) => e.name)).toEqual(['Campus Board Exercises'])
  })

  it('scores route match, weakness, essentials, priority and phase bias', () => {
    const profile: ClimberProfile = {
      facilities: ['lead_wall', 'bouldering_wall'],
      sessionTime: '2 hours',
      yearsExperience: 3,
      attributeRatings: { endurance: 2 },
    }

    const ranked = filterAndRank(small, profile, extractRouteFeatures({ lengths: ['long'] }), { type: 'base', weeks: 4 })

    expect(summary(ranked)).toEqual([
      ['Route 4x4s', 21],
      ['Max Boulder Sessions', 5],
      ['Silent Feet Drills', 4],
      ['Plank', 3],
    ])
  })

  it('adds the pocket bonus and note only for pockety routes', () => {
    const profile: ClimberProfile = { facilities: ['fingerboard'], yearsExperience: 6, maxBoulderGrade: 'V6' }

    const [entry] = filterAndRank([pocketHangs], profile, extractRouteFeatures({ holdTypes: ['pockets'] }))
    expect(entry).toMatchObject({
      name: 'Fingerboard Max Hangs (Pockets)',
      score: 10,
      notes: ['pocket focus: include two- and three-finger pockets'],
    })

    expect(filterAndRank([pocketHangs], profile, extractRouteFeatures({ holdTypes: ['crimpy'] }))).toEqual([])
  })

  it('backfills non-positive exercises at score 0 after the ranked ones', () => {
    const bias = { ...DEFAULT_PHASE_BIAS, phases: { ...DEFAULT_PHASE_BIAS.phases, base: { core: -3 } } }

    const ranked = filterAndRank([plank, silentFeet], {}, extractRouteFeatures({}), { type: 'base', weeks: 4 }, { bias })

    expect(ranked).toHaveLength(2)
    expect(ranked[0]).toMatchObject({ name: 'Silent Feet Drills', score: 4 })
    expect(ranked[1]).toMatchObject({ name: 'Plank', score: 0, notes: ['backfill'] })
  })

  it('lets a power_endurance weakness also boost power work through the power keyword', () => {
    const profile: ClimberProfile = { facilities: ['campus_board'], yearsExperience: 6, maxBoulderGrade: 'V9', age: 30 }
    const features = extractRouteFeatures({})

    const [plain] = filterAndRank([campus], profile, features)
    const [weak] = filterAndRank([campus], { ...profile, weaknesses: 'power_endurance' }, features)

    expect(plain?.score).toBe(5)
    expect(weak?.score).toBe(9)
  })

  it('works on copies and never touches the catalog entries', () => {
    const ranked = filterAndRank([silentFeet], {}, extractRouteFeatures({}))
    const [entry] = ranked

    expect(entry).not.toBe(silentFeet)
    expect(entry?.requiredFacilities).not.toBe(silentFeet.requiredFacilities)
    expect(silentFeet).not.toHaveProperty('score')
  })

  describe('with the bundled catalog', () => {
    const catalog = new ExerciseCatalogService(join(__dirname, '..', '..', 'config', 'exercise-catalog.json')).getExerciseCatalog()

    const profiles: ClimberProfile[] = [
      {},
      { facilities: ['fingerboard', 'pullup_bar'], sessionTime: '30 minutes' },
      { facilities: ['lead_wall', 'auto_belay', 'circuit_board'], sessionTime: '1 hour', experience: 'beginner' },
      { facilities: ['bouldering_wall', 'campus_board'], sessionTime: '90 min', yearsExperience: 8, maxBoulderGrade: 'V8' },
    ]

    it.each(profiles)('only returns exercises the climber can do (%#)', (profile) => {
      const facilities = resolveAvailableFacilities(profile.facilities)
      const budget = profile.sessionTime === undefined ? 120 : Number.parseInt(profile.sessionTime, 10)
      const minutes = profile.sessionTime?.includes('hour') ? budget * 60 : budget

      for (const phaseType of ['base', 'peak', 'taper'] as const) {
        const ranked = filterAndRank(catalog, profile, extractRouteFeatures({ lengths: ['long'] }), { type: phaseType, weeks: 2 })
        for (const ex of ranked) {
          expect(ex.requiredFacilities.every((f) => facilities.has(f))).toBe(true)
          expect(ex.timeRequired).toBeLessThanOrEqual(minutes)
        }
        const scores = ranked.map((e) => e.score)
        expect([...scores].sort((a, b) => b - a)).toEqual(scores)
      }
    })

    it.each<[string, RouteDescriptor]>([
      ['long route', { lengths: ['long'] }],
      ['short route', { lengths: ['short'] }],
      ['plain route', {}],
    ])('keeps taper work to categories already trained in base or peak (%s)', (_label, route) => {
      const features = extractRouteFeatures(route)

      for (const profile of profiles) {
        const byPhase = (['base', 'peak', 'taper'] as const).map((type) =>
          filterAndRank(catalog, profile, features, { type, weeks: type === 'taper' ? 1 : 4 }),
        )
        const [base = [], peak = [], taper = []] = byPhase
        const trained = new Set([...base, ...peak].map((e) => e.category))

        expect(byPhase.flat().filter((e) => e.notes?.includes('backfill'))).toEqual([])
        expect(taper.filter((e) => !trained.has(e.category))).toEqual([])
      }
    })

    it('offers a fingerboard-only climber no wall work', () => {
      const ranked = filterAndRank(catalog, { facilities: ['fingerboard'] }, extractRouteFeatures({}), { type: 'base', weeks: 4 })

      expect(ranked.length).toBeGreaterThan(0)
      expect(ranked.filter((e) => e.requiredFacilities.some((f) => f.endsWith('wall')))).toEqual([])
    })

    it('caps taper phases at 8 exercises', () => {
      const taper = filterAndRank(catalog, {}, extractRouteFeatures({}), { type: 'taper', weeks: 1 })
      const base = filterAndRank(catalog, {}, extractRouteFeatures({}), { type: 'base', weeks: 4 })

      expect(taper).toHaveLength(8)
      expect(base.length).toBeGreaterThan(8)
      expect(taper[0]?.notes).toContain('taper week: cut volume 40-50%, keep intensity')
    })
  })
})

describe('computePhaseWeights', () => {
  const endurance = extractRouteFeatures({ lengths: ['long'] })
  const power = extractRouteFeatures({ lengths: ['short'] })

  it('is empty without a phase', () => {
    expect(computePhaseWeights(undefined, endurance, { endurance: 1 })).toEqual({})
  })

  it('boosts power-endurance work for weak-endurance climbers on endurance routes', () => {
    expect(computePhaseWeights({ type: 'peak', weeks: 4 }, endurance, { endurance: 2 })).toEqual({
      anaerobic_power: 4,
      aerobic_power: 6,
      power: 1,
      strength: 0,
      anaerobic_capacity: -1,
      aerobic_capacity: 0,
    })
    expect(computePhaseWeights({ type: 'peak', weeks: 4 }, endurance, { endurance: 4 })).toEqual(
      DEFAULT_PHASE_BIAS.phases.peak,
    )
  })

  it('boosts strength and power for weak-power climbers on power routes', () => {
    expect(computePhaseWeights({ type: 'base', weeks: 3 }, power, { power: 1 })).toEqual({
      strength: 5,
      anaerobic_capacity: 2,
      aerobic_capacity: 1,
      power: 2,
    })
  })
})

describe('selectForPrompt', () => {
  const make = (name: string, category: ExerciseDef['category'], score: number): RankedExercise => ({
    name,
    category,
    priority: 'high',
    timeRequired: 30,
    requiredFacilities: [],
    description: '',
    score,
  })

  it('reserves the best exercise of each critical system before filling by score', () => {
    const ranked = [
      make('s1', 'strength', 10),
      make('s2', 'strength', 9),
      make('s3', 'strength', 8),
      make('ac', 'aerobic_capacity', 2),
      make('ap', 'aerobic_power', 1),
    ]

    expect(selectForPrompt(ranked, 3).map((e) => e.name)).toEqual(['s1', 'ac', 'ap'])
    expect(selectForPrompt(ranked, 4).map((e) => e.name)).toEqual(['s1', 's2', 'ac', 'ap'])
    expect(selectForPrompt(ranked, 10)).toHaveLength(5)
  })
})
