import { Module } from '@nestjs/common'
import { ExerciseFilterService } from './exercise-filter.service'

@Module({
  providers: [ExerciseFilterService],
  exports: [ExerciseFilterService],
})
export class ExerciseFilterModule {}
