import { Injectable } from "@nestjs/common";
import { pinyin } from "pinyin-pro";
import { BaseService } from "@/common/base/base.service";
import type { CharacterAnalysis } from "@/common/types/translation";

const CJK_RUN = /[\u3400-\u4dbf\u4e00-\u9fff\uf900-\ufaff]+/g;
const CJK_CHARACTER = /^[\u3400-\u4dbf\u4e00-\u9fff\uf900-\ufaff]$/;
const CJK_TEST = /[\u3400-\u4dbf\u4e00-\u9fff\uf900-\ufaff]/;

/** Tone number used for the neutral (light) tone */
export const NEUTRAL_TONE = 5;

/**
 * Hanyu Pinyin romanization backed by pinyin-pro. Stateless and offline.
 */
@Injectable()
export class RomanizationService extends BaseService {
  containsChinese(text: string): boolean {
    return CJK_TEST.test(text);
  }

  /**
   * Romanizes every CJK run of `text`, one syllable per character separated
   * by single spaces. Runs of other characters are kept intact; text without
   * any CJK character comes back unchanged.
   */
  romanize(text: string, includeTones: boolean = true): string {
    if (!text || !this.containsChinese(text)) {
      return text ?? "";
    }

    const withTones = typeof includeTones === "boolean" ? includeTones : true;
    const segments: string[] = [];
    let cursor = 0;

    for (const match of text.matchAll(CJK_RUN)) {
      const start = match.index ?? cursor;
      segments.push(text.slice(cursor, start));
      segments.push(this.syllables(match[0], withTones).join(" "));
      cursor = start + match[0].length;
    }
    segments.push(text.slice(cursor));

    return segments
      .map(segment => segment.trim())
      .filter(segment => segment.length > 0)
      .join(" ");
  }

  /**
   * Tone number of each CJK syllable in reading order (5 = neutral tone).
   */
  toneNumbers(text: string): number[] {
    const tones: number[] = [];

    for (const match of text.matchAll(CJK_RUN)) {
      const numbers = pinyin(match[0], { pattern: "num", type: "array" });
      for (const value of numbers) {
        const tone = Number.parseInt(value, 10);
        tones.push(tone >= 1 && tone <= 4 ? tone : NEUTRAL_TONE);
      }
    }

    return tones;
  }

  /**
   * Pronunciation breakdown of a single CJK character, or null for anything else.
   */
  analyzeCharacter(character: string): CharacterAnalysis | null {
    const trimmed = character.trim();
    if (!CJK_CHARACTER.test(trimmed)) {
      return null;
    }

    const [toneNumber = NEUTRAL_TONE] = this.toneNumbers(trimmed);

    return {
      character: trimmed,
      isChinese: true,
      romanizationWithTones: this.romanize(trimmed, true),
      romanizationPlain: this.romanize(trimmed, false),
      toneNumber,
    };
  }

  private syllables(run: string, withTones: boolean): string[] {
    return pinyin(run, { toneType: withTones ? "symbol" : "none", type: "array" });
  }
}
