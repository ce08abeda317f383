export type ProviderHttpMethod = "GET" | "POST";

export type ProviderParamValue = string | number | boolean;

/**
 * Field that must hold a given value for a response to count as a success,
 * for providers that report errors inside a 200 body.
 */
export interface ProviderSuccessCheck {
  path: string;
  equals: ProviderParamValue;
}

/**
 * Static description of one HTTP translation backend.
 *
 * `url`, string `query` values and string `body` values may contain the
 * placeholders `{text}`, `{source}` and `{target}`. In `url` the substituted
 * values are URL-encoded.
 */
export interface ProviderSpec {
  readonly name: string;
  readonly description: string;
  readonly enabled: boolean;
  readonly method: ProviderHttpMethod;
  readonly url: string;
  readonly query: Readonly<Record<string, ProviderParamValue>>;
  readonly body?: Readonly<Record<string, ProviderParamValue>>;
  readonly headers: Readonly<Record<string, string>>;
  /** Dotted path of the translated string in the JSON response */
  readonly responsePath: string;
  readonly successCheck?: ProviderSuccessCheck;
  /** Treat a translation equal to the input (ignoring case) as a failure */
  readonly rejectEcho: boolean;
  readonly timeoutMs: number;
  readonly maxRetries: number;
  readonly retryDelayMs: number;
  readonly backoffMultiplier: number;
}

export interface ProviderRetryPolicy {
  readonly maxRetries: number;
  readonly retryDelayMs: number;
  readonly backoffMultiplier: number;
}

/**
 * One backend in the translation chain. Implementations throw
 * `ProviderError` on failure and never return an empty translation.
 */
export interface ITranslationProvider {
  readonly name: string;
  readonly description: string;
  readonly retryPolicy: ProviderRetryPolicy;

  translate(text: string, sourceLang: string, targetLang: string): Promise<string>;
}
