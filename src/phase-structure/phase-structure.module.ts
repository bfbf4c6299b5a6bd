import { Module } from '@nestjs/common'
import { PhaseStructureService } from './phase-structure.service'

@Module({
  providers: [PhaseStructureService],
  exports: [PhaseStructureService],
})
export class PhaseStructureModule {}
