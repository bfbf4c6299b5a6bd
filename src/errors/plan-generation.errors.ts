export type PlanGenerationErrorCode =
  | 'CONFIG_MISSING'
  | 'CONFIG_INVALID'
  | 'INVALID_JSON'
  | 'SCHEMA_VALIDATION_FAILED'
  | 'DAY_CONTRACT_VIOLATED'
  | 'TIMEOUT'
  | 'NETWORK'
  | 'PROVIDER_ERROR'
  | 'EMPTY_OUTPUT'
  | 'UNRESOLVED_EXERCISE'
  | 'GENERATION_FAILED'
  | 'CANCELLED'

export class PlanGenerationError extends Error {
  constructor(
    message: string,
    public readonly code: PlanGenerationErrorCode,
    public readonly isRetryable: boolean,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = new.target.name
  }
}

/** Required configuration absent or unreadable. Never retried. */
export class ConfigurationError extends PlanGenerationError {
  constructor(message: string, code: 'CONFIG_MISSING' | 'CONFIG_INVALID' = 'CONFIG_MISSING') {
    super(message, code, false)
  }
}

export class ValidationError extends PlanGenerationError {
  constructor(
    message: string,
    code: 'INVALID_JSON' | 'SCHEMA_VALIDATION_FAILED' | 'DAY_CONTRACT_VIOLATED',
    public readonly issues: string[] = [],
  ) {
    super(message, code, true)
  }
}

export class ExternalServiceError extends PlanGenerationError {
  constructor(message: string, code: 'TIMEOUT' | 'NETWORK' | 'PROVIDER_ERROR' | 'EMPTY_OUTPUT', cause?: unknown) {
    super(message, code, true, { cause })
  }
}

export class UnresolvedExerciseNameError extends PlanGenerationError {
  constructor(
    public readonly token: string,
    public readonly bestCandidate: string | null,
    public readonly similarity: number,
  ) {
    super(`No exercise matches "${token}"`, 'UNRESOLVED_EXERCISE', false)
  }
}

export class GenerationFailedError extends PlanGenerationError {
  constructor(
    public readonly phaseIndex: number,
    public readonly phaseName: string,
    public readonly attempts: number,
    cause?: unknown,
  ) {
    const reason = cause instanceof Error ? `: ${cause.message}` : ''
    super(
      `Could not generate phase ${phaseIndex + 1} "${phaseName}" after ${attempts} attempt(s)${reason}`,
      'GENERATION_FAILED',
      false,
      { cause },
    )
  }
}

export class GenerationCancelledError extends PlanGenerationError {
  constructor(public readonly phasesCompleted: number) {
    super(`Plan generation cancelled after ${phasesCompleted} phase(s)`, 'CANCELLED', false)
  }
}

export function isRetryable(err: unknown): boolean {
  return err instanceof PlanGenerationError && err.isRetryable
}
