import { Inject, Injectable, Logger, Optional } from '@nestjs/common'
import { readFileSync } from 'fs'
import { join } from 'path'
import { ConfigurationError } from '../errors/plan-generation.errors'
import { intensityRanksSchema, type IntensityRanks } from './plan-assembler.schema'

export const INTENSITY_RANKS = Symbol('INTENSITY_RANKS')

export function getIntensityRanksPathFromEnv(env: NodeJS.ProcessEnv = process.env): string {
  const configured = env.INTENSITY_RANKS_PATH?.trim()
  return configured && configured.length > 0 ? configured : join(process.cwd(), 'config', 'intensity-ranks.json')
}

export function loadIntensityRanks(path: string): IntensityRanks {
  let raw: string
  try {
    raw = readFileSync(path, 'utf8')
  } catch {
    throw new ConfigurationError(`Intensity ranks not found at ${path}`)
  }

  let json: unknown
  try {
    json = JSON.parse(raw)
  } catch {
    throw new ConfigurationError(`${path} is not valid JSON`, 'CONFIG_INVALID')
  }

  const parsed = intensityRanksSchema.safeParse(json)
  if (!parsed.success) {
    throw new ConfigurationError(`${path} failed validation`, 'CONFIG_INVALID')
  }
  return parsed.data
}

/**
 * Orders exercises within a day: lower rank climbs first. Names missing from
 * the table get `defaultRank` and keep their relative order.
 */
@Injectable()
export class IntensitySequencer {
  private readonly logger = new Logger(IntensitySequencer.name)
  private readonly ranks: ReadonlyMap<string, number>
  private readonly defaultRank: number

  constructor(@Optional() @Inject(INTENSITY_RANKS) table?: IntensityRanks) {
    const source = table ?? loadIntensityRanks(getIntensityRanksPathFromEnv())
    this.ranks = new Map(Object.entries(source.ranks))
    this.defaultRank = source.defaultRank
    this.logger.log(`Sequencing with ${this.ranks.size} intensity ranks (default ${this.defaultRank})`)
  }

  rankOf(name: string): number {
    return this.ranks.get(name) ?? this.defaultRank
  }

  order<T>(items: readonly T[], nameOf: (item: T) => string): T[] {
    return items
      .map((item, index) => ({ item, index, rank: this.rankOf(nameOf(item)) }))
      .sort((a, b) => a.rank - b.rank || a.index - b.index)
      .map((e) => e.item)
  }
}
