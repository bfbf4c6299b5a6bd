import { Inject, Injectable, Logger, Optional } from '@nestjs/common'
import { readFileSync } from 'fs'
import { join } from 'path'
import { ConfigurationError } from '../errors/plan-generation.errors'
import { exerciseCatalogSchema } from './exercise-catalog.schema'
import type { ExerciseCategory, ExerciseDef } from './exercise-catalog.types'

export const EXERCISE_CATALOG_PATH = Symbol('EXERCISE_CATALOG_PATH')

export function getCatalogPathFromEnv(env: NodeJS.ProcessEnv = process.env): string {
  const configured = env.EXERCISE_CATALOG_PATH?.trim()
  return configured && configured.length > 0 ? configured : join(process.cwd(), 'config', 'exercise-catalog.json')
}

/** Parses and freezes catalog JSON. Entries are shared across requests. */
export function parseExerciseCatalog(raw: string, source = 'exercise catalog'): readonly ExerciseDef[] {
  let json: unknown
  try {
    json = JSON.parse(raw)
  } catch {
    throw new ConfigurationError(`${source} is not valid JSON`, 'CONFIG_INVALID')
  }

  const parsed = exerciseCatalogSchema.safeParse(json)
  if (!parsed.success) {
    const first = parsed.error.issues[0]
    const where = first ? `${first.path.join('.')}: ${first.message}` : 'unknown issue'
    throw new ConfigurationError(`${source} failed validation (${where})`, 'CONFIG_INVALID')
  }

  return Object.freeze(
    parsed.data.map((entry) =>
      Object.freeze({
        ...entry,
        requiredFacilities: Object.freeze([...entry.requiredFacilities]),
        ...(entry.compatibleWith ? { compatibleWith: Object.freeze([...entry.compatibleWith]) } : {}),
      }),
    ),
  )
}

@Injectable()
export class ExerciseCatalogService {
  private readonly logger = new Logger(ExerciseCatalogService.name)
  private readonly catalogPath: string
  private catalog: readonly ExerciseDef[] | null = null

  constructor(@Optional() @Inject(EXERCISE_CATALOG_PATH) catalogPath?: string) {
    this.catalogPath = catalogPath ?? getCatalogPathFromEnv()
  }

  getExerciseCatalog(): readonly ExerciseDef[] {
    if (!this.catalog) {
      let raw: string
      try {
        raw = readFileSync(this.catalogPath, 'utf8')
      } catch {
        throw new ConfigurationError(`Exercise catalog not found at ${this.catalogPath}`)
      }
      this.catalog = parseExerciseCatalog(raw, this.catalogPath)
      this.logger.log(`Loaded ${this.catalog.length} exercises from ${this.catalogPath}`)
    }
    return this.catalog
  }

  findByName(name: string): ExerciseDef | undefined {
    return this.getExerciseCatalog().find((e) => e.name === name)
  }

  listByCategory(category?: ExerciseCategory): readonly ExerciseDef[] {
    const all = this.getExerciseCatalog()
    return category ? all.filter((e) => e.category === category) : all
  }
}
