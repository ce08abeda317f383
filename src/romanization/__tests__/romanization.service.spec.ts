import { RomanizationService, NEUTRAL_TONE } from "../romanization.service";

describe("RomanizationService", () => {
  let service: RomanizationService;

  beforeEach(() => {
    service = new RomanizationService();
  });

  describe("romanize", () => {
    it("should romanize with tone marks by default", () => {
      expect(service.romanize("你好")).toBe("nǐ hǎo");
      expect(service.romanize("学习")).toBe("xué xí");
    });

    it("should drop tone marks when tones are disabled", () => {
      expect(service.romanize("中国", false)).toBe("zhong guo");
    });

    it("should keep the same syllable count with and without tones", () => {
      for (const text of ["你好", "中国人", "学习中文"]) {
        const withTones = service.romanize(text, true).split(" ");
        const plain = service.romanize(text, false).split(" ");
        expect(withTones).toHaveLength(plain.length);
        expect(withTones).toHaveLength(Array.from(text).length);
      }
    });

    it("should return empty input unchanged", () => {
      expect(service.romanize("")).toBe("");
    });

    it("should pass through text without Chinese characters", () => {
      expect(service.romanize("hello world")).toBe("hello world");
      expect(service.romanize("  123 ")).toBe("  123 ");
    });

    it("should keep non-Chinese runs intact between syllables", () => {
      expect(service.romanize("我爱Python")).toBe("wǒ ài Python");
    });

    it("should fall back to tones when the option is not a boolean", () => {
      const looseOption: boolean = JSON.parse('"no"');
      expect(service.romanize("你好", looseOption)).toBe("nǐ hǎo");
    });
  });

  describe("toneNumbers", () => {
    it("should report one tone per syllable", () => {
      expect(service.toneNumbers("你好")).toEqual([3, 3]);
      expect(service.toneNumbers("中国")).toEqual([1, 2]);
    });

    it("should report the neutral tone as 5", () => {
      expect(service.toneNumbers("你们")).toEqual([3, NEUTRAL_TONE]);
    });

    it("should ignore non-Chinese characters", () => {
      expect(service.toneNumbers("abc")).toEqual([]);
    });
  });

  describe("analyzeCharacter", () => {
    it("should describe a single Chinese character", () => {
      expect(service.analyzeCharacter("中")).toEqual({
        character: "中",
        isChinese: true,
        romanizationWithTones: "zhōng",
        romanizationPlain: "zhong",
        toneNumber: 1,
      });
    });

    it("should return null for words and non-Chinese input", () => {
      expect(service.analyzeCharacter("中国")).toBeNull();
      expect(service.analyzeCharacter("a")).toBeNull();
      expect(service.analyzeCharacter("")).toBeNull();
    });
  });

  describe("containsChinese", () => {
    it("should detect CJK characters", () => {
      expect(service.containsChinese("abc 中")).toBe(true);
      expect(service.containsChinese("abc")).toBe(false);
    });

    it("should cover extension A and compatibility ideographs", () => {
      expect(service.containsChinese("\u3400")).toBe(true);
      expect(service.containsChinese("\uf900")).toBe(true);
      expect(service.containsChinese("")).toBe(false);
    });
  });
});
