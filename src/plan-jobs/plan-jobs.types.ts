import type { PlanArtifact } from '../plan-assembler/plan-assembler.schema'

export type PlanJobStatus = 'processing' | 'complete' | 'error'

export type PlanJob = {
  jobId: string
  status: PlanJobStatus
  progress: number // 0..100
  createdAtIso: string
  updatedAtIso: string
  plan?: PlanArtifact
  // set when status is 'error'
  code?: string
  message?: string
}
