import 'reflect-metadata'
import { Logger } from '@nestjs/common'
import { NestFactory } from '@nestjs/core'
import { AppModule } from './app.module'
import { CLIENT_ID_HEADER } from './compositor-usage/compositor-usage.guard'
import { readIntEnv, readStringEnv } from './config/env'

async function bootstrap() {
  const app = await NestFactory.create(AppModule)

  app.enableCors({
    origin: readStringEnv(process.env, 'CORS_ORIGIN') ?? 'http://localhost:5173',
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', CLIENT_ID_HEADER],
  })

  const port = readIntEnv(process.env, 'PORT', 3000, { min: 1, max: 65535 })
  await app.listen(port)
  new Logger('Bootstrap').log(`Listening on ${port}`)
}

bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').error(err instanceof Error ? err.stack ?? err.message : String(err))
  process.exit(1)
})
