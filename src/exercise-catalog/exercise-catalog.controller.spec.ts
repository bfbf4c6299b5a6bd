import { BadRequestException, NotFoundException } from '@nestjs/common'
import { join } from 'path'
import { ExerciseCatalogController } from './exercise-catalog.controller'
import { ExerciseCatalogService } from './exercise-catalog.service'

describe('ExerciseCatalogController', () => {
  const controller = new ExerciseCatalogController(
    new ExerciseCatalogService(join(__dirname, '..', '..', 'config', 'exercise-catalog.json')),
  )

  it('looks up a single exercise by exact name', () => {
    expect(controller.findOne('Route 4x4s')).toMatchObject({
      name: 'Route 4x4s',
      category: 'aerobic_capacity',
      timeRequired: 60,
    })
  })

  it('404s names outside the catalog', () => {
    expect(() => controller.findOne('route 4x4s')).toThrow(NotFoundException)
    expect(() => controller.findOne('Moon Laps')).toThrow(NotFoundException)
  })

  it('filters by category and rejects unknown ones', () => {
    expect(controller.list('core').every((e) => e.category === 'core')).toBe(true)
    expect(() => controller.list('cardio')).toThrow(BadRequestException)
  })
})
