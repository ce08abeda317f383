import { mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { InputError, ProviderError } from "@/common/errors";
import type { ITranslationProvider } from "@/common/types/translation";
import { TranslationCacheService } from "@/cache/translation-cache.service";
import { RetryService } from "@/error-handling/retry.service";
import { TranslationProviderRegistry } from "../providers/translation-provider.registry";
import { TranslationChainService, type TranslationChainConfig } from "../translation-chain.service";

type Translate = ITranslationProvider["translate"];

function createProvider(name: string, translate: Translate, maxRetries = 0): ITranslationProvider & {
  translate: jest.MockedFunction<Translate>;
} {
  return {
    name,
    description: `${name} provider`,
    retryPolicy: { maxRetries, retryDelayMs: 0, backoffMultiplier: 2 },
    translate: jest.fn(translate),
  };
}

const succeed =
  (translation: string): Translate =>
  async () =>
    translation;

const fail =
  (name: string, kind: ProviderError["kind"], message: string, status?: number): Translate =>
  async () => {
    throw new ProviderError(`${name}: ${message}`, name, kind, { status });
  };

describe("TranslationChainService", () => {
  let tempDir: string;
  let cache: TranslationCacheService;
  let registry: TranslationProviderRegistry;

  const createChain = (config: Partial<TranslationChainConfig> = {}) =>
    new TranslationChainService(cache, new RetryService(), registry, {
      sourceLang: "zh",
      targetLang: "vi",
      minRequestIntervalMs: 0,
      maxRetryDelayMs: 0,
      ...config,
    });

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "chain-"));
    cache = new TranslationCacheService({ filePath: join(tempDir, "cache.json") });
    registry = new TranslationProviderRegistry();
  });

  afterEach(async () => {
    await cache.onModuleDestroy();
    rmSync(tempDir, { recursive: true, force: true });
  });

  it("should translate through the first provider and cache the result", async () => {
    const provider = createProvider("alpha", succeed("Xin chào"));
    registry.register(provider);
    const chain = createChain();

    const outcome = await chain.translateWithFallback("你好");

    expect(outcome).toEqual({ translation: "Xin chào", source: "alpha" });
    expect(provider.translate).toHaveBeenCalledWith("你好", "zh", "vi");
    expect(cache.get("你好")).toBe("Xin chào");
  });

  it("should serve a repeated request from the cache without calling providers", async () => {
    const provider = createProvider("alpha", succeed("Xin chào"));
    registry.register(provider);
    const chain = createChain();

    await chain.translateWithFallback("你好");
    const second = await chain.translateWithFallback("  你好 ");

    expect(second).toEqual({ translation: "Xin chào", source: "cache" });
    expect(provider.translate).toHaveBeenCalledTimes(1);
  });

  it("should fall back to the next provider in order", async () => {
    const calls: string[] = [];
    const alpha = createProvider("alpha", async () => {
      calls.push("alpha");
      throw new ProviderError("alpha: HTTP 503", "alpha", "http", { status: 503 });
    });
    const beta = createProvider("beta", async () => {
      calls.push("beta");
      return "Trung Quốc";
    });
    const gamma = createProvider("gamma", succeed("unused"));
    registry.register(alpha);
    registry.register(beta);
    registry.register(gamma);

    const outcome = await createChain().translateWithFallback("中国");

    expect(outcome).toEqual({ translation: "Trung Quốc", source: "beta" });
    expect(calls).toEqual(["alpha", "beta"]);
    expect(gamma.translate).not.toHaveBeenCalled();
  });

  it("should return a none result when every provider fails", async () => {
    registry.register(createProvider("alpha", fail("alpha", "http", "HTTP 503", 503)));
    registry.register(createProvider("beta", fail("beta", "network", "request failed")));
    const startedAt = Date.now();

    const outcome = await createChain().translateWithFallback("你好");

    expect(outcome).toEqual({
      translation: "",
      source: "none",
      error: "All translation providers failed (alpha: HTTP 503; beta: request failed)",
    });
    expect(Date.now() - startedAt).toBeLessThan(1000);
    expect(cache.get("你好")).toBeUndefined();
  });

  it("should report when no provider is enabled", async () => {
    const outcome = await createChain().translateWithFallback("你好");

    expect(outcome).toEqual({ translation: "", source: "none", error: "No translation providers are enabled" });
  });

  it("should retry transient failures up to the provider limit", async () => {
    const provider = createProvider("alpha", fail("alpha", "network", "socket hang up"), 2);
    registry.register(provider);

    await createChain().translateWithFallback("你好");

    expect(provider.translate).toHaveBeenCalledTimes(3);
  });

  it("should not retry failures that cannot improve", async () => {
    const provider = createProvider("alpha", fail("alpha", "parse", "response is not valid JSON"), 2);
    registry.register(provider);

    await createChain().translateWithFallback("你好");

    expect(provider.translate).toHaveBeenCalledTimes(1);
  });

  it("should recover when a retry succeeds", async () => {
    const provider = createProvider("alpha", succeed("Xin chào"), 1);
    provider.translate.mockRejectedValueOnce(new ProviderError("alpha: timed out", "alpha", "timeout"));
    registry.register(provider);

    const outcome = await createChain().translateWithFallback("你好");

    expect(outcome).toEqual({ translation: "Xin chào", source: "alpha" });
    expect(provider.translate).toHaveBeenCalledTimes(2);
  });

  it("should call providers when bypassing the cache and refresh the entry", async () => {
    await cache.put("你好", "Chào");
    const provider = createProvider("alpha", succeed("Xin chào"));
    registry.register(provider);

    const outcome = await createChain().translateWithFallback("你好", { bypassCache: true });

    expect(outcome).toEqual({ translation: "Xin chào", source: "alpha" });
    expect(cache.get("你好")).toBe("Xin chào");
  });

  it("should reject empty text", async () => {
    await expect(createChain().translateWithFallback("   ")).rejects.toBeInstanceOf(InputError);
  });

  it("should space out provider requests", async () => {
    const callTimes: number[] = [];
    registry.register(
      createProvider("alpha", async text => {
        callTimes.push(Date.now());
        return `${text} ok`;
      })
    );
    const chain = createChain({ minRequestIntervalMs: 50 });

    await Promise.all([chain.translateWithFallback("一"), chain.translateWithFallback("二")]);

    expect(callTimes).toHaveLength(2);
    expect(callTimes[1] - callTimes[0]).toBeGreaterThanOrEqual(45);
  });

  it("should list the active provider names", () => {
    registry.register(createProvider("alpha", succeed("a")));
    registry.register(createProvider("beta", succeed("b")));

    expect(createChain().getProviderNames()).toEqual(["alpha", "beta"]);
  });
});
