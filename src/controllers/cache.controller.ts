import { Controller, Get, HttpCode, Post } from "@nestjs/common";
import { ApiTags, ApiOperation, ApiResponse } from "@nestjs/swagger";
import { BaseController } from "@/common/base/base.controller";
import type { CacheStats } from "@/common/types/cache";
import { TranslationCacheService } from "@/cache/translation-cache.service";
import { CacheClearResponseDto, CacheStatsDto } from "./dto/cache.dto";

@ApiTags("Translation Cache")
@Controller("cache")
export class CacheController extends BaseController {
  constructor(private readonly cacheService: TranslationCacheService) {
    super();
  }

  @Get("stats")
  @ApiOperation({ summary: "Translation cache statistics" })
  @ApiResponse({ status: 200, type: CacheStatsDto })
  getStats(): CacheStats {
    return this.cacheService.stats();
  }

  @Post("clear")
  @HttpCode(200)
  @ApiOperation({
    summary: "Clear the translation cache",
    description: "Removes every entry and persists the empty cache. Clearing an empty cache is a no-op.",
  })
  @ApiResponse({ status: 200, type: CacheClearResponseDto })
  async clear(): Promise<CacheClearResponseDto> {
    return this.executeOperation(async () => {
      const cleared = await this.cacheService.clear();
      this.logger.log(`Translation cache cleared (${cleared} entries)`);
      return { cleared };
    }, "clearCache");
  }
}
