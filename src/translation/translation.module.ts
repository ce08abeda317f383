import { Module } from "@nestjs/common";
import axios from "axios";
import { CacheModule } from "@/cache/cache.module";
import { ProviderConfigLoader } from "@/config/provider-config.loader";
import { ENV } from "@/config/environment.constants";
import {
  TRANSLATION_CHAIN_CONFIG,
  TranslationChainService,
  type TranslationChainConfig,
} from "./translation-chain.service";
import { HttpTranslationProvider, type ProviderHttpClient } from "./providers/http-translation.provider";
import { TranslationProviderRegistry } from "./providers/translation-provider.registry";

export const TRANSLATION_HTTP_CLIENT = "TRANSLATION_HTTP_CLIENT";

@Module({
  imports: [CacheModule],
  providers: [
    {
      provide: TRANSLATION_HTTP_CLIENT,
      useFactory: (): ProviderHttpClient => axios.create({ headers: { "User-Agent": "hanviet-lookup" } }),
    },
    {
      provide: TranslationProviderRegistry,
      useFactory: (loader: ProviderConfigLoader, http: ProviderHttpClient) => {
        const registry = new TranslationProviderRegistry();
        for (const spec of loader.loadProviderSpecs()) {
          if (spec.enabled) {
            registry.register(new HttpTranslationProvider(spec, http));
          }
        }
        return registry;
      },
      inject: [ProviderConfigLoader, TRANSLATION_HTTP_CLIENT],
    },
    {
      provide: TRANSLATION_CHAIN_CONFIG,
      useFactory: (): TranslationChainConfig => ({
        sourceLang: ENV.TRANSLATION.SOURCE_LANG,
        targetLang: ENV.TRANSLATION.TARGET_LANG,
        minRequestIntervalMs: ENV.TRANSLATION.MIN_REQUEST_INTERVAL_MS,
        maxRetryDelayMs: ENV.TRANSLATION.MAX_RETRY_DELAY_MS,
      }),
    },
    TranslationChainService,
  ],
  exports: [TranslationChainService, TranslationProviderRegistry],
})
export class TranslationModule {}
