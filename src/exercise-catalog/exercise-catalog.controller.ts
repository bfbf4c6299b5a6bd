import { BadRequestException, Controller, Get, NotFoundException, Param, Query } from '@nestjs/common'
import { ExerciseCatalogService } from './exercise-catalog.service'
import { EXERCISE_CATEGORIES, type ExerciseCategory } from './exercise-catalog.types'

function isExerciseCategory(value: string): value is ExerciseCategory {
  return EXERCISE_CATEGORIES.some((c) => c === value)
}

@Controller('exercises')
export class ExerciseCatalogController {
  constructor(private readonly catalogService: ExerciseCatalogService) {}

  @Get()
  list(@Query('category') category?: string) {
    if (category === undefined) {
      return this.catalogService.listByCategory()
    }
    if (!isExerciseCategory(category)) {
      throw new BadRequestException(`Unknown category "${category}"`)
    }
    return this.catalogService.listByCategory(category)
  }

  @Get(':name')
  findOne(@Param('name') name: string) {
    const exercise = this.catalogService.findByName(name)
    if (!exercise) {
      throw new NotFoundException(`Exercise "${name}" not found`)
    }
    return exercise
  }
}
