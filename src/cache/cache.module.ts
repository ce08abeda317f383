import { Module } from "@nestjs/common";
import { ENV } from "@/config/environment.constants";
import { TRANSLATION_CACHE_CONFIG, TranslationCacheService } from "./translation-cache.service";

@Module({
  providers: [
    {
      provide: TRANSLATION_CACHE_CONFIG,
      useFactory: () => ({ filePath: ENV.CACHE.FILE_PATH }),
    },
    TranslationCacheService,
  ],
  exports: [TranslationCacheService],
})
export class CacheModule {}
