import { readIntEnv, readNumberEnv } from '../config/env'

export const PLAN_ASSEMBLER_CONFIG = Symbol('PLAN_ASSEMBLER_CONFIG')

export type PlanAssemblerConfig = {
  maxAttempts: number
  baseTemperature: number
  temperatureStep: number
  promptExerciseLimit: number
  // names listed verbatim in retry prompts
  retryNameLimit: number
}

export const DEFAULT_PLAN_ASSEMBLER_CONFIG: PlanAssemblerConfig = {
  maxAttempts: 3,
  baseTemperature: 0.4,
  temperatureStep: 0.15,
  promptExerciseLimit: 15,
  retryNameLimit: 20,
}

export function getPlanAssemblerConfigFromEnv(env: NodeJS.ProcessEnv = process.env): PlanAssemblerConfig {
  const d = DEFAULT_PLAN_ASSEMBLER_CONFIG
  return {
    maxAttempts: readIntEnv(env, 'PLAN_MAX_ATTEMPTS', d.maxAttempts, { min: 1, max: 5 }),
    baseTemperature: readNumberEnv(env, 'PLAN_BASE_TEMPERATURE', d.baseTemperature, { min: 0, max: 2 }),
    temperatureStep: readNumberEnv(env, 'PLAN_TEMPERATURE_STEP', d.temperatureStep, { min: 0, max: 1 }),
    promptExerciseLimit: readIntEnv(env, 'PLAN_PROMPT_EXERCISE_LIMIT', d.promptExerciseLimit, { min: 1 }),
    retryNameLimit: d.retryNameLimit,
  }
}

/** Non-increasing in `attempt` (1-based), floored at 0. */
export function temperatureForAttempt(config: PlanAssemblerConfig, attempt: number): number {
  const t = config.baseTemperature - config.temperatureStep * (attempt - 1)
  return Math.max(0, Math.round(t * 1000) / 1000)
}
