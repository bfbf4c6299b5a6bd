import { Module } from '@nestjs/common'
import { CompositorModule } from '../compositor/compositor.module'
import { ExerciseCatalogModule } from '../exercise-catalog/exercise-catalog.module'
import { ExerciseFilterModule } from '../exercise-filter/exercise-filter.module'
import { PhaseStructureModule } from '../phase-structure/phase-structure.module'
import { RouteFeaturesModule } from '../route-features/route-features.module'
import { INTENSITY_RANKS, IntensitySequencer, getIntensityRanksPathFromEnv, loadIntensityRanks } from './intensity-sequencer'
import { PLAN_ASSEMBLER_CONFIG, getPlanAssemblerConfigFromEnv } from './plan-assembler.config'
import { PlanAssemblerService } from './plan-assembler.service'

@Module({
  imports: [CompositorModule, ExerciseCatalogModule, ExerciseFilterModule, PhaseStructureModule, RouteFeaturesModule],
  providers: [
    { provide: PLAN_ASSEMBLER_CONFIG, useFactory: () => getPlanAssemblerConfigFromEnv() },
    { provide: INTENSITY_RANKS, useFactory: () => loadIntensityRanks(getIntensityRanksPathFromEnv()) },
    IntensitySequencer,
    PlanAssemblerService,
  ],
  exports: [PlanAssemblerService, CompositorModule, ExerciseCatalogModule, RouteFeaturesModule],
})
export class PlanAssemblerModule {}
