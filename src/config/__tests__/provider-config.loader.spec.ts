import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { ConfigurationError } from "@/common/errors";
import { ProviderConfigLoader } from "../provider-config.loader";

describe("ProviderConfigLoader", () => {
  let loader: ProviderConfigLoader;
  let tempDir: string;

  const minimalProvider = {
    name: "echo",
    url: "https://translate.test/api",
    responsePath: "result.text",
  };

  beforeEach(() => {
    loader = new ProviderConfigLoader();
    tempDir = mkdtempSync(join(tmpdir(), "providers-"));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe("loadProviderSpecs", () => {
    it("should load the bundled provider chain in order", () => {
      const specs = loader.loadProviderSpecs(join(__dirname, "../../../config/providers.json"));

      expect(specs.map(spec => spec.name)).toEqual(["mymemory", "libretranslate", "argos", "lingva"]);
      expect(specs[0].query).toEqual({ q: "{text}", langpair: "{source}|{target}" });
      expect(specs[0].successCheck).toEqual({ path: "responseStatus", equals: 200 });
      expect(specs[1].method).toBe("POST");
    });

    it("should keep every bundled provider within a few seconds including retries", () => {
      const specs = loader.loadProviderSpecs(join(__dirname, "../../../config/providers.json"));

      for (const spec of specs) {
        let worstCaseMs = spec.timeoutMs * (spec.maxRetries + 1);
        let delayMs = spec.retryDelayMs;
        for (let retry = 0; retry < spec.maxRetries; retry++) {
          worstCaseMs += delayMs;
          delayMs *= spec.backoffMultiplier;
        }
        expect(worstCaseMs).toBeLessThanOrEqual(5000);
      }
    });

    it("should read a file and apply defaults", () => {
      const configPath = join(tempDir, "providers.json");
      writeFileSync(configPath, JSON.stringify([minimalProvider]));

      const [spec] = loader.loadProviderSpecs(configPath);

      expect(spec).toEqual({
        name: "echo",
        description: "echo",
        enabled: true,
        method: "GET",
        url: "https://translate.test/api",
        query: {},
        body: undefined,
        headers: {},
        responsePath: "result.text",
        successCheck: undefined,
        rejectEcho: false,
        timeoutMs: 5000,
        maxRetries: 2,
        retryDelayMs: 500,
        backoffMultiplier: 2,
      });
    });

    it("should throw ConfigurationError for a missing file", () => {
      expect(() => loader.loadProviderSpecs(join(tempDir, "missing.json"))).toThrow(ConfigurationError);
    });

    it("should throw ConfigurationError for invalid JSON", () => {
      const configPath = join(tempDir, "providers.json");
      writeFileSync(configPath, "not json");

      expect(() => loader.loadProviderSpecs(configPath)).toThrow(ConfigurationError);
    });
  });

  describe("parseProviderSpecs", () => {
    it("should return frozen specs", () => {
      const specs = loader.parseProviderSpecs([{ ...minimalProvider, query: { q: "{text}" } }]);

      expect(Object.isFrozen(specs)).toBe(true);
      expect(Object.isFrozen(specs[0])).toBe(true);
      expect(Object.isFrozen(specs[0].query)).toBe(true);
    });

    it("should reject a non-array document", () => {
      expect(() => loader.parseProviderSpecs({ providers: [] })).toThrow("Provider configuration must be an array");
    });

    it("should reject an empty chain", () => {
      expect(() => loader.parseProviderSpecs([])).toThrow(
        "Provider configuration must declare at least one provider"
      );
    });

    it("should reject duplicate provider names", () => {
      expect(() => loader.parseProviderSpecs([minimalProvider, minimalProvider])).toThrow(
        "Duplicate provider name: echo"
      );
    });

    it("should reject provider names that are not lowercase", () => {
      expect(() => loader.parseProviderSpecs([{ ...minimalProvider, name: "MyMemory" }])).toThrow(
        "Invalid provider #0: name: name must be a lowercase identifier"
      );
    });

    it("should reject entries that are not objects", () => {
      expect(() => loader.parseProviderSpecs(["mymemory"])).toThrow("Provider #0 must be an object");
    });

    it("should report invalid fields with their path", () => {
      expect(() => loader.parseProviderSpecs([{ ...minimalProvider, url: "ftp://translate.test" }])).toThrow(
        "Invalid provider #0: url: url must start with http:// or https://"
      );
    });

    it("should reject query values that are not scalars", () => {
      expect(() => loader.parseProviderSpecs([{ ...minimalProvider, query: { q: ["a"] } }])).toThrow(
        "Invalid provider #0: query: query must be an object of string, number or boolean values"
      );
    });

    it("should reject an unsupported method", () => {
      expect(() => loader.parseProviderSpecs([{ ...minimalProvider, method: "PUT" }])).toThrow(ConfigurationError);
    });

    it("should reject a body on a GET provider", () => {
      expect(() => loader.parseProviderSpecs([{ ...minimalProvider, body: { q: "{text}" } }])).toThrow(
        "Provider echo declares a body but uses GET"
      );
    });

    it("should validate nested success checks", () => {
      expect(() =>
        loader.parseProviderSpecs([{ ...minimalProvider, successCheck: { path: "", equals: 200 } }])
      ).toThrow(ConfigurationError);
    });

    it("should keep disabled providers with enabled set to false", () => {
      const [spec] = loader.parseProviderSpecs([{ ...minimalProvider, enabled: false }]);

      expect(spec.enabled).toBe(false);
    });
  });
});
