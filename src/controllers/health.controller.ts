import { Controller, Get } from "@nestjs/common";
import { ApiTags, ApiOperation, ApiResponse, ApiExtraModels } from "@nestjs/swagger";
import { BaseController } from "@/common/base/base.controller";
import { TranslationCacheService } from "@/cache/translation-cache.service";
import { RetryService } from "@/error-handling/retry.service";
import { TranslationChainService } from "@/translation/translation-chain.service";
import { HealthProviderStatsDto, HealthResponseDto } from "./dto/health.dto";

@ApiTags("System Health")
@ApiExtraModels(HealthProviderStatsDto)
@Controller()
export class HealthController extends BaseController {
  constructor(
    private readonly translationChain: TranslationChainService,
    private readonly cacheService: TranslationCacheService,
    private readonly retryService: RetryService
  ) {
    super();
  }

  @Get("health")
  @ApiOperation({
    summary: "Health check endpoint",
    description:
      "Reports the active translation providers, their attempt statistics and the cache size. " +
      "Degraded when no provider is active.",
  })
  @ApiResponse({ status: 200, type: HealthResponseDto })
  getHealth(): HealthResponseDto {
    const providers = this.translationChain.getProviderNames();
    const { entryCount, fileExists } = this.cacheService.stats();

    return {
      status: providers.length > 0 ? "healthy" : "degraded",
      timestamp: Date.now(),
      uptime: Math.floor((Date.now() - this.startupTime) / 1000),
      providers,
      cache: { entryCount, fileExists },
      providerStats: this.retryService.getRetryStatistics(),
    };
  }
}
