import { Test } from '@nestjs/testing'
import { CompositorUsageService, getUsageLimitsFromEnv } from './compositor-usage.service'
import { USAGE_LIMITS } from './compositor-usage.types'
import { CLOCK } from './clock'
import type { Clock } from './clock'

describe('CompositorUsageService', () => {
  let now: Date
  let clock: Clock
  let service: CompositorUsageService

  beforeEach(async () => {
    now = new Date('2026-03-02T10:00:00.000Z')
    clock = { now: () => now }

    const mod = await Test.createTestingModule({
      providers: [
        CompositorUsageService,
        { provide: CLOCK, useValue: clock },
        { provide: USAGE_LIMITS, useValue: { preview: 3, plan: 1 } },
      ],
    }).compile()

    service = mod.get(CompositorUsageService)
  })

  it('keeps previews and plans on separate allowances', () => {
    expect(service.reserve('client:a', 'plan')).toEqual({
      allowed: true,
      kind: 'plan',
      limit: 1,
      used: 1,
      resetAtIso: '2026-03-03T00:00:00.000Z',
    })
    expect(service.reserve('client:a', 'plan')).toMatchObject({ allowed: false, reason: 'exhausted', used: 1 })

    expect(service.reserve('client:a', 'preview')).toMatchObject({ allowed: true, limit: 3, used: 1 })
    expect(service.reserve('client:b', 'plan')).toMatchObject({ allowed: true, used: 1 })
  })

  it('does not count refused requests', () => {
    service.reserve('client:a', 'plan')
    service.reserve('client:a', 'plan')
    service.reserve('client:a', 'plan')

    expect(service.usedToday('client:a', 'plan')).toBe(1)
  })

  it('refunds a reservation and never goes below zero', () => {
    service.reserve('client:a', 'preview')
    service.reserve('client:a', 'preview')
    service.refund('client:a', 'preview')
    expect(service.usedToday('client:a', 'preview')).toBe(1)

    service.refund('client:a', 'preview')
    service.refund('client:a', 'preview')
    expect(service.usedToday('client:a', 'preview')).toBe(0)
  })

  it('starts a fresh ledger on the next UTC day', () => {
    service.reserve('client:a', 'plan')
    now = new Date('2026-03-03T00:00:01.000Z')

    expect(service.usedToday('client:a', 'plan')).toBe(0)
    expect(service.reserve('client:a', 'plan')).toMatchObject({
      allowed: true,
      used: 1,
      resetAtIso: '2026-03-04T00:00:00.000Z',
    })
  })

  it('reports a kind with a zero limit as disabled', () => {
    const off = new CompositorUsageService(clock, { preview: 0, plan: 5 })

    expect(off.reserve('client:a', 'preview')).toMatchObject({ allowed: false, reason: 'disabled', limit: 0, used: 0 })
    expect(off.reserve('client:a', 'plan')).toMatchObject({ allowed: true })
  })
})

describe('getUsageLimitsFromEnv', () => {
  it('uses defaults and clamps negative values to zero', () => {
    expect(getUsageLimitsFromEnv({})).toEqual({ preview: 100, plan: 20 })
    expect(getUsageLimitsFromEnv({ COMPOSITOR_DAILY_PREVIEW_LIMIT: '-4', COMPOSITOR_DAILY_PLAN_LIMIT: '7.9' })).toEqual({
      preview: 0,
      plan: 7,
    })
  })
})
