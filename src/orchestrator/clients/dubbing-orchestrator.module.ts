import { Module } from "@nestjs/common"
import { ConfigModule } from "@nestjs/config"
import { TemporalClientService } from "./temporal-client.service"

/**
 * Temporal client and in-process worker for dubbing workflows
 */
@Module({
  imports: [ConfigModule],
  providers: [TemporalClientService],
  exports: [TemporalClientService],
})
export class DubbingOrchestratorModule {}
