import { Module } from "@nestjs/common";
import { RomanizationModule } from "@/romanization/romanization.module";
import { TranslationModule } from "@/translation/translation.module";
import { ENV } from "@/config/environment.constants";
import { LOOKUP_CONFIG, LookupService, type LookupConfig } from "./lookup.service";

@Module({
  imports: [RomanizationModule, TranslationModule],
  providers: [
    {
      provide: LOOKUP_CONFIG,
      useFactory: (): LookupConfig => ({
        batchConcurrency: ENV.TRANSLATION.BATCH_CONCURRENCY,
        maxBatchSize: ENV.TRANSLATION.MAX_BATCH_SIZE,
      }),
    },
    LookupService,
  ],
  exports: [LookupService],
})
export class LookupModule {}
