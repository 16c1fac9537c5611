import 'reflect-metadata'
import { NestFactory } from '@nestjs/core'
import { AppModule } from './app.module'
import envConfig from './shared/config'
import { LoggerService } from './shared/services/logger.service'

async function bootstrap() {
  const app = await NestFactory.create(AppModule)

  app.enableCors({
    origin: envConfig.CORS_ORIGIN,
    methods: ['GET', 'POST', 'DELETE'],
    allowedHeaders: ['Content-Type'],
  })

  await app.listen(envConfig.PORT)
  app.get(LoggerService).logInfo(`Application is running on: http://localhost:${envConfig.PORT}`)
}

bootstrap().catch((error: unknown) => {
  console.error(error)
  process.exit(1)
})
