import { EnvironmentUtils } from "../environment.utils";
import { isLogLevel, type LogLevel } from "@/common/types/logging";

const mockConsoleWarn = jest.spyOn(console, "warn").mockImplementation();

describe("EnvironmentUtils", () => {
  beforeEach(() => {
    jest.clearAllMocks();
    delete process.env.TEST_INT;
    delete process.env.TEST_STRING;
    delete process.env.TEST_LEVEL;
  });

  afterAll(() => {
    mockConsoleWarn.mockRestore();
  });

  describe("parseInt", () => {
    it("should return default value when env var is not set", () => {
      expect(EnvironmentUtils.parseInt("TEST_INT", 42)).toBe(42);
    });

    it("should parse valid integer", () => {
      process.env.TEST_INT = "123";
      expect(EnvironmentUtils.parseInt("TEST_INT", 42)).toBe(123);
    });

    it("should return default value for invalid integer", () => {
      process.env.TEST_INT = "invalid";
      expect(EnvironmentUtils.parseInt("TEST_INT", 42)).toBe(42);
      expect(mockConsoleWarn).toHaveBeenCalledWith('Invalid integer value "invalid" for TEST_INT, using default 42');
    });

    it("should fall back when the value is out of range", () => {
      process.env.TEST_INT = "70000";
      expect(EnvironmentUtils.parseInt("TEST_INT", 7860, { min: 1, max: 65535, fieldName: "APP_PORT" })).toBe(7860);
      expect(mockConsoleWarn).toHaveBeenCalledWith(
        "Value 70000 for APP_PORT is above maximum 65535, using default 7860"
      );

      process.env.TEST_INT = "-1";
      expect(EnvironmentUtils.parseInt("TEST_INT", 500, { min: 0 })).toBe(500);
    });

    it("should accept the range bounds", () => {
      process.env.TEST_INT = "0";
      expect(EnvironmentUtils.parseInt("TEST_INT", 500, { min: 0, max: 10 })).toBe(0);
    });
  });

  describe("parseString", () => {
    it("should return the value or the default", () => {
      expect(EnvironmentUtils.parseString("TEST_STRING", "data/cache.json")).toBe("data/cache.json");

      process.env.TEST_STRING = "/tmp/cache.json";
      expect(EnvironmentUtils.parseString("TEST_STRING", "data/cache.json")).toBe("/tmp/cache.json");
    });

    it("should treat an empty value as unset", () => {
      process.env.TEST_STRING = "";
      expect(EnvironmentUtils.parseString("TEST_STRING", "fallback")).toBe("fallback");
    });
  });

  describe("parseChoice", () => {
    it("should accept a known choice case-insensitively", () => {
      process.env.TEST_LEVEL = " DEBUG ";
      expect(EnvironmentUtils.parseChoice<LogLevel>("TEST_LEVEL", "log", isLogLevel)).toBe("debug");
    });

    it("should fall back on an unknown choice", () => {
      process.env.TEST_LEVEL = "chatty";
      expect(EnvironmentUtils.parseChoice<LogLevel>("TEST_LEVEL", "log", isLogLevel)).toBe("log");
      expect(mockConsoleWarn).toHaveBeenCalledWith('Unsupported value "chatty" for TEST_LEVEL, using default log');
    });
  });
});
