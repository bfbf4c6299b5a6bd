import { Global, Module } from '@nestjs/common'
import { CompositorUsageModule } from '../compositor-usage/compositor-usage.module'
import { CompositorCacheService } from './compositor-cache.service'

@Global()
@Module({
  imports: [CompositorUsageModule],
  providers: [CompositorCacheService],
  exports: [CompositorCacheService],
})
export class CompositorCacheModule {}
