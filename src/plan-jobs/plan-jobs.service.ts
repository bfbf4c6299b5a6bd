import { Inject, Injectable, Logger, Optional } from '@nestjs/common'
import { randomUUID } from 'crypto'
import { readIntEnv } from '../config/env'
import { CLOCK, type Clock } from '../compositor-usage/clock'
import { PlanGenerationError } from '../errors/plan-generation.errors'
import { toPlanArtifact } from '../plan-assembler/plan-artifact'
import { PlanAssemblerService } from '../plan-assembler/plan-assembler.service'
import type { PlanRequest } from '../plan-assembler/plan-assembler.types'
import type { PlanJob } from './plan-jobs.types'

export const PLAN_JOB_TTL_SEC = Symbol('PLAN_JOB_TTL_SEC')

export function getPlanJobTtlSecFromEnv(env: NodeJS.ProcessEnv = process.env): number {
  return readIntEnv(env, 'PLAN_JOB_TTL_SEC', 600, { min: 1 })
}

type JobEntry = {
  job: PlanJob
  controller: AbortController
}

/**
 * In-memory background plan generation. Finished and running jobs are
 * forgotten once untouched for the TTL; a forgotten running job is aborted
 * at its next phase boundary.
 */
@Injectable()
export class PlanJobsService {
  private readonly logger = new Logger(PlanJobsService.name)
  private readonly jobs = new Map<string, JobEntry>()
  private readonly ttlMs: number

  constructor(
    private readonly assembler: PlanAssemblerService,
    @Inject(CLOCK) private readonly clock: Clock,
    @Optional() @Inject(PLAN_JOB_TTL_SEC) ttlSec?: number,
  ) {
    this.ttlMs = (ttlSec ?? getPlanJobTtlSecFromEnv()) * 1000
  }

  start(request: PlanRequest): PlanJob {
    this.sweep()

    const nowIso = this.clock.now().toISOString()
    const entry: JobEntry = {
      job: { jobId: randomUUID(), status: 'processing', progress: 0, createdAtIso: nowIso, updatedAtIso: nowIso },
      controller: new AbortController(),
    }
    this.jobs.set(entry.job.jobId, entry)
    this.logger.log(`Job ${entry.job.jobId} started (${request.weeksToTrain} wk, ${request.sessionsPerWeek}/wk)`)

    void this.run(entry, request)
    return { ...entry.job }
  }

  get(id: string): PlanJob | null {
    this.sweep()
    const entry = this.jobs.get(id)
    return entry ? { ...entry.job } : null
  }

  private async run(entry: JobEntry, request: PlanRequest): Promise<void> {
    try {
      const plan = await this.assembler.assemble(request, {
        signal: entry.controller.signal,
        onProgress: (done, total) => this.update(entry, { progress: Math.floor((done / total) * 100) }),
      })
      this.update(entry, { status: 'complete', progress: 100, plan: toPlanArtifact(plan) })
      this.logger.log(`Job ${entry.job.jobId} complete`)
    } catch (err) {
      const code = err instanceof PlanGenerationError ? err.code : 'INTERNAL'
      const message = err instanceof Error ? err.message : String(err)
      this.update(entry, { status: 'error', code, message })
      this.logger.error(`Job ${entry.job.jobId} failed: ${message}`)
    }
  }

  private update(entry: JobEntry, patch: Partial<Omit<PlanJob, 'jobId' | 'createdAtIso'>>): void {
    entry.job = { ...entry.job, ...patch, updatedAtIso: this.clock.now().toISOString() }
  }

  private sweep(): void {
    const now = this.clock.now().getTime()
    for (const [id, entry] of this.jobs) {
      if (now - Date.parse(entry.job.updatedAtIso) > this.ttlMs) {
        entry.controller.abort()
        this.jobs.delete(id)
      }
    }
  }
}
