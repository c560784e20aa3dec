import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { validateEnv } from "./common/config/env.validation";
import { SettingsModule } from "./common/config/settings.module";
import { PipelineModule } from "./modules/pipeline/pipeline.module";

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      cache: true,
      validate: validateEnv,
    }),
    SettingsModule,
    PipelineModule,
  ],
})
export class AppModule {}
