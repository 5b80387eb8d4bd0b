import { describe, expect, it } from "vitest";
import { ConfigError, loadConfig } from "./config";

const baseEnv = {
  GOOGLE_API_KEY: "test-google-key",
  HADITH_API_KEY: "test-hadith-key",
};

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig(baseEnv);

    expect(config.mode).toBe("enriched");
    expect(config.requestTimeoutMs).toBe(10000);
    expect(config.llm).toEqual({
      provider: "gemini",
      geminiApiKey: "test-google-key",
      geminiApiUrl:
        "https://generativelanguage.googleapis.com/v1/models/gemini-1.5-flash:generateContent",
      openaiApiKey: "",
      openaiModel: "gpt-4o-mini",
    });
    expect(config.quran).toEqual({
      baseUrl: "https://api.alquran.cloud/v1",
      edition: "en",
      maxResults: 5,
    });
    expect(config.hadith).toEqual({
      baseUrl: "https://api.sunnah.com/v1",
      apiKey: "test-hadith-key",
      maxResults: 10,
    });
  });

  it("returns a frozen object", () => {
    const config = loadConfig(baseEnv);

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.llm)).toBe(true);
    expect(Object.isFrozen(config.hadith)).toBe(true);
  });

  it("reads overrides and strips trailing slashes from base URLs", () => {
    const config = loadConfig({
      ...baseEnv,
      QURAN_API_URL: "http://localhost:9000/v1/",
      HADITH_API_URL: "http://localhost:9001/v1",
      REQUEST_TIMEOUT_MS: "2500",
      OPENAI_MODEL: "gpt-4o",
    });

    expect(config.quran.baseUrl).toBe("http://localhost:9000/v1");
    expect(config.hadith.baseUrl).toBe("http://localhost:9001/v1");
    expect(config.requestTimeoutMs).toBe(2500);
    expect(config.llm.openaiModel).toBe("gpt-4o");
  });

  it("requires the Gemini key for the gemini provider", () => {
    expect(() => loadConfig({ HADITH_API_KEY: "test-hadith-key" })).toThrow(ConfigError);
    expect(() => loadConfig({ HADITH_API_KEY: "test-hadith-key" })).toThrow(
      "Missing GOOGLE_API_KEY"
    );
  });

  it("requires the OpenAI key for the openai provider", () => {
    expect(() =>
      loadConfig({ LLM_PROVIDER: "openai", HADITH_API_KEY: "test-hadith-key" })
    ).toThrow("Missing OPENAI_API_KEY");
  });

  it("does not require the Hadith key", () => {
    const config = loadConfig({ GOOGLE_API_KEY: "test-google-key" });

    expect(config.mode).toBe("enriched");
    expect(config.hadith.apiKey).toBe("");
  });

  it("treats whitespace-only keys as missing", () => {
    expect(() => loadConfig({ ...baseEnv, GOOGLE_API_KEY: "   " })).toThrow(
      "Missing GOOGLE_API_KEY"
    );
  });

  it("rejects unknown modes, providers and bad timeouts", () => {
    expect(() => loadConfig({ ...baseEnv, FATWA_MODE: "fancy" })).toThrow(
      'Invalid FATWA_MODE "fancy"'
    );
    expect(() => loadConfig({ ...baseEnv, LLM_PROVIDER: "claude" })).toThrow(
      'Invalid LLM_PROVIDER "claude"'
    );
    expect(() => loadConfig({ ...baseEnv, REQUEST_TIMEOUT_MS: "0" })).toThrow(
      'Invalid REQUEST_TIMEOUT_MS "0"'
    );
    expect(() => loadConfig({ ...baseEnv, REQUEST_TIMEOUT_MS: "soon" })).toThrow(ConfigError);
  });
});
