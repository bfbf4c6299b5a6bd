import { Module } from '@nestjs/common'
import { PlanAssemblerModule } from '../plan-assembler/plan-assembler.module'
import { PlanJobsModule } from '../plan-jobs/plan-jobs.module'
import { PlanPreviewModule } from '../plan-preview/plan-preview.module'
import { TrainingPlansController } from './training-plans.controller'

@Module({
  imports: [PlanAssemblerModule, PlanPreviewModule, PlanJobsModule],
  controllers: [TrainingPlansController],
})
export class TrainingPlansModule {}
