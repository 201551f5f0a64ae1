import { Module } from "@nestjs/common"
import { ConfigModule, ConfigService } from "@nestjs/config"
import { MulterModule } from "@nestjs/platform-express"
import { LoggerModule } from "nestjs-pino"
import { DubbingController, buildUploadOptions } from "./dubbing.controller"
import { DubbingService } from "./dubbing.service"
import { DubbingOrchestratorModule } from "./orchestrator/clients/dubbing-orchestrator.module"
import { loadConfiguration } from "./config/configuration"

@Module({
  imports: [
    ConfigModule.forRoot({
      load: [
        () => {
          const config = loadConfiguration()
          console.log(`${config.SERVICE_NAME} configurations validated successfully.`)
          return config
        },
      ],
      cache: true,
      isGlobal: true,
    }),
    LoggerModule.forRoot({
      pinoHttp: {
        transport:
          process.env.NODE_ENV?.toLowerCase() === "production"
            ? undefined
            : {
                target: "pino-pretty",
                options: {
                  singleLine: true,
                  translateTime: "dd/mm/yyyy HH:MM:ss",
                },
              },
        customProps: () => ({
          context: "VideoDubber",
        }),
      },
    }),
    MulterModule.registerAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => buildUploadOptions(configService.getOrThrow<string>("UPLOAD_DIR")),
    }),
    DubbingOrchestratorModule,
  ],
  controllers: [DubbingController],
  providers: [DubbingService],
})
export class DubbingModule {}
