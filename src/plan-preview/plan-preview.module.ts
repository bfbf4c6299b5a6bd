import { Module } from '@nestjs/common'
import { CompositorModule } from '../compositor/compositor.module'
import { RouteFeaturesModule } from '../route-features/route-features.module'
import { PlanPreviewService } from './plan-preview.service'

@Module({
  imports: [CompositorModule, RouteFeaturesModule],
  providers: [PlanPreviewService],
  exports: [PlanPreviewService],
})
export class PlanPreviewModule {}
