import axios, { AxiosError, isAxiosError, type AxiosRequestConfig } from "axios";
import { ProviderError } from "@/common/errors";
import { fillTemplate, fillTemplateRecord, getValueAtPath } from "@/common/utils/common.utils";
import type { ITranslationProvider, ProviderRetryPolicy, ProviderSpec } from "@/common/types/translation";

export interface ProviderHttpResponse {
  status: number;
  data: unknown;
}

/**
 * The part of an axios instance the providers use
 */
export interface ProviderHttpClient {
  request(config: AxiosRequestConfig): Promise<ProviderHttpResponse>;
}

const TIMEOUT_CODES = new Set<string | undefined>([AxiosError.ECONNABORTED, AxiosError.ETIMEDOUT]);

/**
 * Translation provider driven entirely by a {@link ProviderSpec}
 */
export class HttpTranslationProvider implements ITranslationProvider {
  readonly retryPolicy: ProviderRetryPolicy;

  constructor(
    private readonly spec: ProviderSpec,
    private readonly http: ProviderHttpClient = axios
  ) {
    this.retryPolicy = {
      maxRetries: spec.maxRetries,
      retryDelayMs: spec.retryDelayMs,
      backoffMultiplier: spec.backoffMultiplier,
    };
  }

  get name(): string {
    return this.spec.name;
  }

  get description(): string {
    return this.spec.description;
  }

  async translate(text: string, sourceLang: string, targetLang: string): Promise<string> {
    const response = await this.send(this.buildRequest(text, sourceLang, targetLang));

    if (response.status === 429) {
      throw this.failure("rate limited", "rate_limit", { status: response.status });
    }
    if (response.status < 200 || response.status >= 300) {
      throw this.failure(`HTTP ${response.status}`, "http", { status: response.status });
    }

    const document = this.parseBody(response.data);
    this.checkSuccess(document);

    const value = getValueAtPath(document, this.spec.responsePath);
    if (typeof value !== "string") {
      throw this.failure(`response has no string at '${this.spec.responsePath}'`, "parse");
    }

    const translation = value.trim();
    if (!translation) {
      throw this.failure("empty translation", "empty");
    }
    if (this.spec.rejectEcho && translation.toLowerCase() === text.trim().toLowerCase()) {
      throw this.failure("translation echoes the input", "empty");
    }

    return translation;
  }

  buildRequest(text: string, sourceLang: string, targetLang: string): AxiosRequestConfig {
    const values = { text, source: sourceLang, target: targetLang };

    return {
      method: this.spec.method,
      url: fillTemplate(this.spec.url, values, encodeURIComponent),
      params: fillTemplateRecord(this.spec.query, values),
      data: this.spec.body ? fillTemplateRecord(this.spec.body, values) : undefined,
      headers: { Accept: "application/json", ...this.spec.headers },
      timeout: this.spec.timeoutMs,
      // Status codes are classified by translate()
      validateStatus: () => true,
    };
  }

  private async send(config: AxiosRequestConfig): Promise<ProviderHttpResponse> {
    try {
      return await this.http.request(config);
    } catch (error) {
      if (isAxiosError(error) && TIMEOUT_CODES.has(error.code)) {
        throw this.failure(`timed out after ${this.spec.timeoutMs}ms`, "timeout", { cause: error });
      }
      const message = error instanceof Error ? error.message : String(error);
      throw this.failure(`request failed: ${message}`, "network", { cause: error });
    }
  }

  private parseBody(data: unknown): unknown {
    if (typeof data !== "string") {
      return data;
    }
    try {
      return JSON.parse(data);
    } catch (error) {
      throw this.failure("response is not valid JSON", "parse", { cause: error });
    }
  }

  private checkSuccess(document: unknown): void {
    const check = this.spec.successCheck;
    if (!check) {
      return;
    }

    const actual = getValueAtPath(document, check.path);
    if (actual === check.equals) {
      return;
    }

    const status = typeof actual === "number" ? actual : undefined;
    throw this.failure(
      `${check.path} was ${JSON.stringify(actual)}, expected ${JSON.stringify(check.equals)}`,
      status === 429 ? "rate_limit" : "http",
      { status }
    );
  }

  private failure(
    reason: string,
    kind: ProviderError["kind"],
    options: { status?: number; cause?: unknown } = {}
  ): ProviderError {
    return new ProviderError(`${this.spec.name}: ${reason}`, this.spec.name, kind, options);
  }
}
