import { mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { InputError, ProviderError } from "@/common/errors";
import { ErrorCode } from "@/common/types/error-handling";
import type { ITranslationProvider } from "@/common/types/translation";
import { TranslationCacheService } from "@/cache/translation-cache.service";
import { RetryService } from "@/error-handling/retry.service";
import { RomanizationService } from "@/romanization/romanization.service";
import { TranslationProviderRegistry } from "@/translation/providers/translation-provider.registry";
import { TranslationChainService } from "@/translation/translation-chain.service";
import { LookupService } from "../lookup.service";

describe("LookupService", () => {
  let tempDir: string;
  let cache: TranslationCacheService;
  let registry: TranslationProviderRegistry;
  let romanization: RomanizationService;
  let chain: TranslationChainService;
  let service: LookupService;
  let translate: jest.MockedFunction<ITranslationProvider["translate"]>;

  const dictionary: Record<string, string> = {
    你好: "Xin chào",
    中国: "Trung Quốc",
    中: "giữa",
    学习: "học tập",
  };

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "lookup-"));
    cache = new TranslationCacheService({ filePath: join(tempDir, "cache.json") });
    registry = new TranslationProviderRegistry();
    translate = jest.fn(async (text: string, _sourceLang: string, _targetLang: string) => {
      const translation = dictionary[text];
      if (!translation) {
        throw new ProviderError("alpha: HTTP 500", "alpha", "http", { status: 500 });
      }
      return translation;
    });
    registry.register({
      name: "alpha",
      description: "dictionary provider",
      retryPolicy: { maxRetries: 0, retryDelayMs: 0, backoffMultiplier: 1 },
      translate,
    });
    romanization = new RomanizationService();
    chain = new TranslationChainService(cache, new RetryService(), registry, {
      sourceLang: "zh",
      targetLang: "vi",
      minRequestIntervalMs: 0,
      maxRetryDelayMs: 0,
    });
    service = new LookupService(romanization, chain, { batchConcurrency: 2, maxBatchSize: 5 });
  });

  afterEach(async () => {
    await cache.onModuleDestroy();
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe("lookup", () => {
    it("should combine romanization and translation", async () => {
      const result = await service.lookup(" 你好 ");

      expect(result).toEqual({
        sourceText: "你好",
        romanization: "nǐ hǎo",
        translation: "Xin chào",
        translationSource: "alpha",
      });
      expect(Object.isFrozen(result)).toBe(true);
    });

    it("should report a cache hit on the second lookup", async () => {
      await service.lookup("中国");
      const result = await service.lookup("中国", { includeTones: false });

      expect(result.romanization).toBe("zhong guo");
      expect(result.translationSource).toBe("cache");
      expect(translate).toHaveBeenCalledTimes(1);
    });

    it("should keep the romanization when translation is unavailable", async () => {
      const result = await service.lookup("坏");

      expect(result).toEqual({
        sourceText: "坏",
        romanization: "huài",
        translation: "",
        translationSource: "none",
        error: "All translation providers failed (alpha: HTTP 500)",
      });
    });

    it("should keep the translation when romanization throws", async () => {
      jest.spyOn(romanization, "romanize").mockImplementation(() => {
        throw new Error("dictionary unavailable");
      });

      const result = await service.lookup("学习");

      expect(result.romanization).toBe("");
      expect(result.translation).toBe("học tập");
      expect(result.error).toBe("Romanization failed: dictionary unavailable");
    });

    it("should keep the romanization when the translation chain rejects", async () => {
      jest.spyOn(chain, "translateWithFallback").mockRejectedValue(new Error("cache offline"));

      const result = await service.lookup("学习");

      expect(result).toEqual({
        sourceText: "学习",
        romanization: "xué xí",
        translation: "",
        translationSource: "none",
        error: "Translation failed: cache offline",
      });
    });

    it("should add a character analysis for single characters on request", async () => {
      const single = await service.lookup("中", { detailedAnalysis: true });
      const word = await service.lookup("中国", { detailedAnalysis: true });

      expect(single.analysis).toEqual({
        character: "中",
        isChinese: true,
        romanizationWithTones: "zhōng",
        romanizationPlain: "zhong",
        toneNumber: 1,
      });
      expect(word).not.toHaveProperty("analysis");
    });

    it("should pass bypassCache to the chain", async () => {
      await service.lookup("你好");
      const result = await service.lookup("你好", { bypassCache: true });

      expect(result.translationSource).toBe("alpha");
      expect(translate).toHaveBeenCalledTimes(2);
    });

    it("should reject blank text", async () => {
      await expect(service.lookup(" \n ")).rejects.toBeInstanceOf(InputError);
    });
  });

  describe("lookupBatch", () => {
    it("should return one result per input with a failing middle item tagged none", async () => {
      const results = await service.lookupBatch(["你好", "坏", "中国"]);

      expect(results).toHaveLength(3);
      expect(results.map(result => result.translationSource)).toEqual(["alpha", "none", "alpha"]);
      expect(results[1].romanization).toBe("huài");
      expect(results[1].error).toBe("All translation providers failed (alpha: HTTP 500)");
    });

    it("should turn empty items into error results", async () => {
      const results = await service.lookupBatch(["你好", "  "]);

      expect(results[1]).toEqual({
        sourceText: "  ",
        romanization: "",
        translation: "",
        translationSource: "none",
        error: "Text to look up must not be empty",
      });
    });

    it("should keep input order and bound concurrency", async () => {
      let inFlight = 0;
      let maxInFlight = 0;
      translate.mockImplementation(async (text: string) => {
        inFlight++;
        maxInFlight = Math.max(maxInFlight, inFlight);
        await new Promise(resolve => setTimeout(resolve, text === "一" ? 30 : 5));
        inFlight--;
        return `${text}!`;
      });

      const results = await service.lookupBatch(["一", "二", "三", "四"]);

      expect(results.map(result => result.translation)).toEqual(["一!", "二!", "三!", "四!"]);
      expect(maxInFlight).toBe(2);
    });

    it("should reject batches above the size limit", async () => {
      const texts = ["一", "二", "三", "四", "五", "六"];

      await expect(service.lookupBatch(texts)).rejects.toMatchObject({
        code: ErrorCode.BATCH_TOO_LARGE,
        message: "Batch of 6 items exceeds the limit of 5",
      });
      expect(translate).not.toHaveBeenCalled();
    });
  });

  describe("parseBatchInput", () => {
    it("should split lines and drop blanks", () => {
      expect(service.parseBatchInput("你好\r\n\n  中国 \n")).toEqual(["你好", "中国"]);
    });
  });
});
