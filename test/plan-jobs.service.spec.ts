import { join } from 'path'
import type { Clock } from '../src/compositor-usage/clock'
import type { CompositionRequest } from '../src/compositor/compositor.types'
import { ExerciseCatalogService } from '../src/exercise-catalog/exercise-catalog.service'
import { ExerciseFilterService } from '../src/exercise-filter/exercise-filter.service'
import { IntensitySequencer, loadIntensityRanks } from '../src/plan-assembler/intensity-sequencer'
import { DEFAULT_PLAN_ASSEMBLER_CONFIG } from '../src/plan-assembler/plan-assembler.config'
import { PlanAssemblerService } from '../src/plan-assembler/plan-assembler.service'
import type { PlanRequest } from '../src/plan-assembler/plan-assembler.types'
import { PlanJobsService } from '../src/plan-jobs/plan-jobs.service'
import type { PlanJob } from '../src/plan-jobs/plan-jobs.types'
import { PhaseStructureService } from '../src/phase-structure/phase-structure.service'
import { RouteFeaturesService } from '../src/route-features/route-features.service'

const configDir = join(__dirname, '..', 'config')

const request: PlanRequest = {
  route: { name: 'Test Line', grade: '7a' },
  profile: {},
  weeksToTrain: 8,
  sessionsPerWeek: 2,
}

function weekly(req: CompositionRequest): string {
  const days = req.task === 'weekly-schedule' ? req.context.trainingDays : []
  return JSON.stringify({
    weekly_schedule: days.map((day) => ({ day, focus: 'Plank', details: 'Three 45 s holds.' })),
  })
}

const flush = () => new Promise<void>((resolve) => setImmediate(resolve))

async function settle(service: PlanJobsService, id: string): Promise<PlanJob | null> {
  for (let i = 0; i < 50; i++) {
    const job = service.get(id)
    if (!job || job.status !== 'processing') return job
    await flush()
  }
  return service.get(id)
}

describe('PlanJobsService', () => {
  let now: Date
  let clock: Clock
  let compose: jest.Mock<Promise<string>, [CompositionRequest]>
  let service: PlanJobsService

  beforeEach(() => {
    now = new Date('2025-12-17T10:00:00.000Z')
    clock = { now: () => now }
    compose = jest.fn<Promise<string>, [CompositionRequest]>()

    const assembler = new PlanAssemblerService(
      new ExerciseCatalogService(join(configDir, 'exercise-catalog.json')),
      new RouteFeaturesService(),
      new PhaseStructureService(),
      new ExerciseFilterService(),
      new IntensitySequencer(loadIntensityRanks(join(configDir, 'intensity-ranks.json'))),
      { provider: 'stub', compose },
      DEFAULT_PLAN_ASSEMBLER_CONFIG,
    )
    service = new PlanJobsService(assembler, clock, 600)
  })

  it('runs a job to completion', async () => {
    compose.mockImplementation(async (req) => weekly(req))

    const started = service.start(request)
    expect(started).toMatchObject({ status: 'processing', progress: 0, createdAtIso: '2025-12-17T10:00:00.000Z' })

    const done = await settle(service, started.jobId)
    expect(done?.status).toBe('complete')
    expect(done?.progress).toBe(100)
    expect(done?.plan?.phases).toHaveLength(2)
    expect(done?.plan?.phases[0]?.weekly_schedule.map((d) => d.day)).toEqual(['Tuesday', 'Friday'])
  })

  it('reports progress per finished phase', async () => {
    let release: (text: string) => void = () => undefined
    compose
      .mockImplementationOnce(async (req) => weekly(req))
      .mockImplementationOnce(
        (req) =>
          new Promise<string>((resolve) => {
            release = () => resolve(weekly(req))
          }),
      )

    const { jobId: id } = service.start(request)
    for (let i = 0; i < 10; i++) await flush()

    expect(service.get(id)).toMatchObject({ status: 'processing', progress: 50 })

    release('')
    expect((await settle(service, id))?.status).toBe('complete')
  })

  it('records the failure of a phase', async () => {
    compose.mockResolvedValue('nope')

    const { jobId: id } = service.start(request)
    const job = await settle(service, id)

    expect(job?.status).toBe('error')
    expect(job?.code).toBe('GENERATION_FAILED')
    expect(job?.message).toMatch(/^Could not generate phase 1 /)
  })

  it('forgets jobs untouched for longer than the ttl', async () => {
    compose.mockImplementation(async (req) => weekly(req))
    const { jobId: id } = service.start(request)
    await settle(service, id)

    now = new Date('2025-12-17T10:10:01.000Z')
    expect(service.get(id)).toBeNull()
  })

  it('returns null for an unknown id', () => {
    expect(service.get('missing')).toBeNull()
  })
})
