import { BadGatewayException, HttpException, InternalServerErrorException } from '@nestjs/common'
import { ConfigurationError, GenerationFailedError, PlanGenerationError } from '../errors/plan-generation.errors'

/** Domain errors to Nest exceptions; anything else is rethrown unchanged. */
export function toHttpException(err: unknown): unknown {
  if (err instanceof HttpException) return err
  if (err instanceof GenerationFailedError) {
    return new BadGatewayException({
      statusCode: 502,
      message: err.message,
      code: err.code,
      phaseIndex: err.phaseIndex,
      phaseName: err.phaseName,
      attempts: err.attempts,
    })
  }
  if (err instanceof ConfigurationError) {
    return new InternalServerErrorException(err.message)
  }
  if (err instanceof PlanGenerationError && err.isRetryable) {
    return new BadGatewayException({ statusCode: 502, message: err.message, code: err.code })
  }
  return err
}
