import { Module } from '@nestjs/common'
import { AppController } from './app.controller'
import { CompositorCacheModule } from './compositor-cache/compositor-cache.module'
import { CompositorUsageModule } from './compositor-usage/compositor-usage.module'
import { ExerciseCatalogModule } from './exercise-catalog/exercise-catalog.module'
import { TrainingPlansModule } from './training-plans/training-plans.module'

@Module({
  imports: [CompositorUsageModule, CompositorCacheModule, ExerciseCatalogModule, TrainingPlansModule],
  controllers: [AppController],
})
export class AppModule {}
