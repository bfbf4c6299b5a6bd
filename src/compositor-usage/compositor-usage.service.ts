import { Inject, Injectable, Logger, Optional } from '@nestjs/common'
import { readIntEnv } from '../config/env'
import type { Clock } from './clock'
import { CLOCK, nextUtcMidnightIso, utcDayKey } from './clock'
import {
  DEFAULT_USAGE_LIMITS,
  USAGE_LIMITS,
  type UsageDecision,
  type UsageKind,
  type UsageLimits,
} from './compositor-usage.types'

export function getUsageLimitsFromEnv(env: NodeJS.ProcessEnv = process.env): UsageLimits {
  return {
    preview: readIntEnv(env, 'COMPOSITOR_DAILY_PREVIEW_LIMIT', DEFAULT_USAGE_LIMITS.preview, { min: 0 }),
    plan: readIntEnv(env, 'COMPOSITOR_DAILY_PLAN_LIMIT', DEFAULT_USAGE_LIMITS.plan, { min: 0 }),
  }
}

type Tally = Record<UsageKind, number>

/**
 * Per-client daily allowance of compositor-backed requests, kept apart for
 * previews and full plans. The ledger only ever holds the current UTC day.
 */
@Injectable()
export class CompositorUsageService {
  private readonly logger = new Logger(CompositorUsageService.name)
  private readonly limits: UsageLimits
  private ledgerDay = ''
  private ledger = new Map<string, Tally>()

  constructor(
    @Inject(CLOCK) private readonly clock: Clock,
    @Optional() @Inject(USAGE_LIMITS) limits?: UsageLimits,
  ) {
    this.limits = limits ?? DEFAULT_USAGE_LIMITS
  }

  reserve(clientKey: string, kind: UsageKind): UsageDecision {
    const now = this.clock.now()
    const tally = this.tallyFor(clientKey, now)
    const limit = this.limits[kind]
    const resetAtIso = nextUtcMidnightIso(now)
    const used = tally[kind]

    if (limit === 0) return { allowed: false, reason: 'disabled', kind, limit, used, resetAtIso }
    if (used >= limit) {
      this.logger.warn(`${clientKey} used all ${limit} ${kind} request(s) for today`)
      return { allowed: false, reason: 'exhausted', kind, limit, used, resetAtIso }
    }

    tally[kind] = used + 1
    return { allowed: true, kind, limit, used: used + 1, resetAtIso }
  }

  /** Gives back a reservation that never reached the compositor, e.g. a cached preview. */
  refund(clientKey: string, kind: UsageKind): void {
    const tally = this.tallyFor(clientKey, this.clock.now())
    if (tally[kind] > 0) tally[kind] -= 1
  }

  usedToday(clientKey: string, kind: UsageKind): number {
    return this.tallyFor(clientKey, this.clock.now())[kind]
  }

  private tallyFor(clientKey: string, now: Date): Tally {
    const day = utcDayKey(now)
    if (day !== this.ledgerDay) {
      this.ledgerDay = day
      this.ledger = new Map()
    }

    let tally = this.ledger.get(clientKey)
    if (!tally) {
      tally = { preview: 0, plan: 0 }
      this.ledger.set(clientKey, tally)
    }
    return tally
  }
}
