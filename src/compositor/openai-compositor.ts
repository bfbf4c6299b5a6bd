import { Logger } from '@nestjs/common'
import OpenAI, { APIConnectionError, APIConnectionTimeoutError, APIError } from 'openai'
import { ConfigurationError, ExternalServiceError } from '../errors/plan-generation.errors'
import type { CompositorConfig } from './compositor.config'
import type { CompositionRequest, PlanCompositor } from './compositor.types'
import { extractResponseOutputText } from './response-text'

export class OpenAiCompositor implements PlanCompositor {
  readonly provider = 'openai' as const
  private readonly logger = new Logger(OpenAiCompositor.name)
  private readonly client: OpenAI

  constructor(private readonly config: CompositorConfig) {
    if (!config.apiKey) {
      throw new ConfigurationError('OPENAI_API_KEY missing')
    }
    this.client = new OpenAI({ apiKey: config.apiKey })
  }

  async compose(request: CompositionRequest): Promise<string> {
    const startedAt = Date.now()
    let response: OpenAI.Responses.Response
    try {
      response = await this.client.responses.create(
        {
          model: this.config.model,
          instructions: request.system,
          input: request.input,
          temperature: request.temperature,
          max_output_tokens: this.config.maxOutputTokens,
        },
        { timeout: this.config.timeoutMs, maxRetries: 0 },
      )
    } catch (err) {
      throw toExternalServiceError(err, this.config.timeoutMs)
    }

    this.logger.debug(`${request.task} composed by ${this.config.model} in ${Date.now() - startedAt}ms`)

    const text = extractResponseOutputText(response)
    if (!text) {
      throw new ExternalServiceError('Compositor response missing text', 'EMPTY_OUTPUT')
    }
    return text
  }
}

function toExternalServiceError(err: unknown, timeoutMs: number): ExternalServiceError {
  if (err instanceof APIConnectionTimeoutError) {
    return new ExternalServiceError(`Compositor timed out after ${timeoutMs}ms`, 'TIMEOUT', err)
  }
  if (err instanceof APIConnectionError) {
    return new ExternalServiceError('Compositor unreachable', 'NETWORK', err)
  }
  if (err instanceof APIError) {
    const status = err.status === undefined ? '' : ` (status ${err.status})`
    return new ExternalServiceError(`Compositor request failed${status}`, 'PROVIDER_ERROR', err)
  }
  const message = err instanceof Error ? err.message : String(err)
  return new ExternalServiceError(`Compositor request failed: ${message}`, 'PROVIDER_ERROR', err)
}
