import { Module } from '@nestjs/common'
import { RouteFeaturesService } from './route-features.service'

@Module({
  providers: [RouteFeaturesService],
  exports: [RouteFeaturesService],
})
export class RouteFeaturesModule {}
