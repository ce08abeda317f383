import { ConfigurationError } from "@/common/errors";
import type { ITranslationProvider } from "@/common/types/translation";

/**
 * Ordered set of translation providers. Registration order is chain order.
 */
export class TranslationProviderRegistry {
  private readonly providers = new Map<string, ITranslationProvider>();

  /**
   * Append a provider to the end of the chain
   */
  register(provider: ITranslationProvider): void {
    const normalizedName = provider.name.toLowerCase();

    if (this.providers.has(normalizedName)) {
      throw new ConfigurationError(`Provider '${provider.name}' is already registered`);
    }

    this.providers.set(normalizedName, provider);
  }

  /**
   * Providers in chain order
   */
  getActiveProviders(): ITranslationProvider[] {
    return Array.from(this.providers.values());
  }

  getProviderNames(): string[] {
    return this.getActiveProviders().map(provider => provider.name);
  }
}
