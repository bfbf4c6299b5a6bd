import { Inject, Injectable } from '@nestjs/common'
import { createHash } from 'crypto'
import stableStringify from 'fast-json-stable-stringify'
import { CLOCK, utcDayKey, type Clock } from '../compositor-usage/clock'
import type { CompositionRequest } from '../compositor/compositor.types'

type Namespace = CompositionRequest['task']

export function hashInput(value: unknown): string {
  return createHash('sha256').update(stableStringify(value)).digest('hex')
}

/** Raw compositor text per UTC day; everything from earlier days is dropped on write. */
@Injectable()
export class CompositorCacheService {
  private readonly cache = new Map<string, string>()

  constructor(@Inject(CLOCK) private readonly clock: Clock) {}

  private buildKey(namespace: Namespace, inputHash: string): string {
    return `${namespace}:${utcDayKey(this.clock.now())}:${inputHash}`
  }

  get(namespace: Namespace, inputHash: string): { text: string; cache: 'hit' } | null {
    const text = this.cache.get(this.buildKey(namespace, inputHash))
    if (text === undefined) return null
    return { text, cache: 'hit' }
  }

  set(namespace: Namespace, inputHash: string, text: string): void {
    const today = utcDayKey(this.clock.now())

    for (const key of this.cache.keys()) {
      const dayKey = key.split(':')[1]
      if (dayKey && dayKey !== today) {
        this.cache.delete(key)
      }
    }

    this.cache.set(this.buildKey(namespace, inputHash), text)
  }
}
