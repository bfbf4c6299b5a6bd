import { Module } from '@nestjs/common'
import { ExerciseCatalogController } from './exercise-catalog.controller'
import { ExerciseCatalogService } from './exercise-catalog.service'

@Module({
  controllers: [ExerciseCatalogController],
  providers: [ExerciseCatalogService],
  exports: [ExerciseCatalogService],
})
export class ExerciseCatalogModule {}
