import { readIntEnv, readStringEnv } from '../config/env'

export const COMPOSITOR_CONFIG = Symbol('COMPOSITOR_CONFIG')

export type CompositorConfig = {
  provider: 'stub' | 'openai'
  apiKey?: string
  model: string
  timeoutMs: number
  maxOutputTokens: number
}

export function getCompositorConfigFromEnv(env: NodeJS.ProcessEnv = process.env): CompositorConfig {
  return {
    provider: readStringEnv(env, 'COMPOSITOR_PROVIDER')?.toLowerCase() === 'openai' ? 'openai' : 'stub',
    apiKey: readStringEnv(env, 'OPENAI_API_KEY'),
    model: readStringEnv(env, 'COMPOSITOR_MODEL') ?? 'gpt-4o-mini',
    timeoutMs: readIntEnv(env, 'COMPOSITOR_TIMEOUT_MS', 45_000, { min: 1_000 }),
    maxOutputTokens: readIntEnv(env, 'COMPOSITOR_MAX_OUTPUT_TOKENS', 4_000, { min: 256 }),
  }
}
