import { Module } from '@nestjs/common'
import { PlanAssemblerModule } from '../plan-assembler/plan-assembler.module'
import { PlanJobsService } from './plan-jobs.service'

@Module({
  imports: [PlanAssemblerModule],
  providers: [PlanJobsService],
  exports: [PlanJobsService],
})
export class PlanJobsModule {}
