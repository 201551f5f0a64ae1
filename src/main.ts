import "reflect-metadata"
import { NestFactory } from "@nestjs/core"
import { DubbingModule } from "./dubbing.module"
import { ValidationPipe } from "@nestjs/common"
import { Logger } from "nestjs-pino"
import { ConfigService } from "@nestjs/config"
import { DocumentBuilder, SwaggerModule } from "@nestjs/swagger"
import { HttpExceptionFilter } from "./common/filters/http-exception.filter"

async function bootstrap() {
  const app = await NestFactory.create(DubbingModule, { bufferLogs: true })

  app.useLogger(app.get(Logger))
  app.enableShutdownHooks()

  app.useGlobalFilters(new HttpExceptionFilter())

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      enableDebugMessages: true,
      forbidNonWhitelisted: true,
      transformOptions: {
        enableImplicitConversion: true,
      },
    }),
  )

  // Swagger Configuration
  const config = new DocumentBuilder().setTitle("Video Dubber API").setDescription("API for dubbing videos into other languages using OpenAI and Temporal workflows").setVersion("1.0.0").addTag("dubbing", "Video dubbing endpoints").addTag("health", "Health check endpoints").build()

  const document = SwaggerModule.createDocument(app, config)
  SwaggerModule.setup("api", app, document)

  const configService = app.get(ConfigService)
  const port = configService.get<number>("PORT", 3001)

  await app.listen(port)

  const logger = app.get(Logger)
  logger.log(`🚀 Video Dubber service is running on port ${port}`)
  logger.log(`📚 Swagger documentation available at http://localhost:${port}/api`)
}

bootstrap().catch((error: unknown) => {
  console.error("Failed to start Video Dubber service", error)
  process.exit(1)
})
