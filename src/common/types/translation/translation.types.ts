export const TRANSLATION_SOURCE = {
  CACHE: "cache",
  NONE: "none",
} as const;

/**
 * Where a translation came from: {@link TRANSLATION_SOURCE.CACHE},
 * {@link TRANSLATION_SOURCE.NONE}, or the name of the provider that produced it.
 */
export type TranslationSource = string;

export interface TranslationOutcome {
  translation: string;
  source: TranslationSource;
  /** Present when no provider could translate the text */
  error?: string;
}

export interface TranslateOptions {
  /** Skip the cache lookup; a successful provider result still refreshes the cache */
  bypassCache?: boolean;
}

export interface LookupOptions extends TranslateOptions {
  includeTones?: boolean;
  detailedAnalysis?: boolean;
}

export interface CharacterAnalysis {
  readonly character: string;
  readonly isChinese: boolean;
  readonly romanizationWithTones: string;
  readonly romanizationPlain: string;
  /** 1-4, or 5 for the neutral tone */
  readonly toneNumber: number;
}

export interface LookupResult {
  readonly sourceText: string;
  readonly romanization: string;
  readonly translation: string;
  readonly translationSource: TranslationSource;
  readonly error?: string;
  readonly analysis?: CharacterAnalysis;
}
