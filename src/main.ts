import 'reflect-metadata'
import { Logger } from '@nestjs/common'
import { NestFactory } from '@nestjs/core'
import { AppModule } from './app.module'
import { ENGINE_CONFIG, type EngineConfig } from './config/engine.config'
import { USER_ID_HEADER } from './auth/user-context.guard'

async function bootstrap() {
  const app = await NestFactory.create(AppModule)
  const config = app.get<EngineConfig>(ENGINE_CONFIG)

  app.enableCors({
    methods: ['GET', 'POST', 'PUT', 'OPTIONS'],
    allowedHeaders: ['Content-Type', USER_ID_HEADER],
  })
  app.enableShutdownHooks()

  await app.listen(config.port)
  new Logger('Bootstrap').log(`listening on :${config.port} (store: ${config.store.kind})`)
}

bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').error(err instanceof Error ? (err.stack ?? err.message) : String(err))
  process.exitCode = 1
})
