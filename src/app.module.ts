import { Module } from "@nestjs/common";

// App controllers
import { LookupController } from "@/controllers/lookup.controller";
import { CacheController } from "@/controllers/cache.controller";
import { HealthController } from "@/controllers/health.controller";

// Core modules
import { ConfigModule } from "@/config/config.module";
import { ErrorHandlingModule } from "@/error-handling/error-handling.module";
import { CacheModule } from "@/cache/cache.module";
import { TranslationModule } from "@/translation/translation.module";
import { LookupModule } from "@/lookup/lookup.module";
import { PresentationModule } from "@/presentation/presentation.module";

@Module({
  imports: [
    ConfigModule,
    ErrorHandlingModule, // Global retry service
    CacheModule,
    TranslationModule,
    LookupModule,
    PresentationModule,
  ],
  controllers: [LookupController, CacheController, HealthController],
})
export class AppModule {}
