import { Global, Module } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { PIPELINE_SETTINGS, pipelineSettingsFactory } from "./pipeline-settings";

/**
 * Exposes the typed pipeline settings to every module
 */
@Global()
@Module({
  providers: [
    {
      provide: PIPELINE_SETTINGS,
      useFactory: pipelineSettingsFactory,
      inject: [ConfigService],
    },
  ],
  exports: [PIPELINE_SETTINGS],
})
export class SettingsModule {}
