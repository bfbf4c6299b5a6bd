import { Global, Module } from '@nestjs/common'
import { CompositorUsageGuard } from './compositor-usage.guard'
import { CompositorUsageService, getUsageLimitsFromEnv } from './compositor-usage.service'
import { USAGE_LIMITS } from './compositor-usage.types'
import { CLOCK, SystemClock } from './clock'

@Global()
@Module({
  providers: [
    { provide: CLOCK, useClass: SystemClock },
    { provide: USAGE_LIMITS, useFactory: () => getUsageLimitsFromEnv() },
    CompositorUsageService,
    CompositorUsageGuard,
  ],
  exports: [CompositorUsageService, CompositorUsageGuard, CLOCK],
})
export class CompositorUsageModule {}
