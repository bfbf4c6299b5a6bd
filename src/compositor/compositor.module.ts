import { Logger, Module } from '@nestjs/common'
import { COMPOSITOR_CONFIG, getCompositorConfigFromEnv, type CompositorConfig } from './compositor.config'
import { COMPOSITOR, type PlanCompositor } from './compositor.types'
import { OpenAiCompositor } from './openai-compositor'
import { StubCompositor } from './stub-compositor'

export function createCompositor(config: CompositorConfig): PlanCompositor {
  if (config.provider === 'openai') {
    return new OpenAiCompositor(config)
  }
  return new StubCompositor()
}

@Module({
  providers: [
    { provide: COMPOSITOR_CONFIG, useFactory: () => getCompositorConfigFromEnv() },
    {
      provide: COMPOSITOR,
      useFactory: (config: CompositorConfig) => {
        const compositor = createCompositor(config)
        new Logger('CompositorModule').log(`Using ${compositor.provider} compositor`)
        return compositor
      },
      inject: [COMPOSITOR_CONFIG],
    },
  ],
  exports: [COMPOSITOR],
})
export class CompositorModule {}
