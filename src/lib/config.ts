/**
 * Runtime configuration, read once from the environment
 */

import type { FatwaMode, LlmProvider } from "./types";

export interface FatwaConfig {
  mode: FatwaMode;
  requestTimeoutMs: number;
  llm: {
    provider: LlmProvider;
    geminiApiKey: string;
    geminiApiUrl: string;
    openaiApiKey: string;
    openaiModel: string;
  };
  quran: {
    baseUrl: string;
    edition: string;
    maxResults: number;
  };
  hadith: {
    baseUrl: string;
    apiKey: string;
    maxResults: number;
  };
}

export const DEFAULTS = {
  geminiApiUrl:
    "https://generativelanguage.googleapis.com/v1/models/gemini-1.5-flash:generateContent",
  openaiModel: "gpt-4o-mini",
  quranApiUrl: "https://api.alquran.cloud/v1",
  quranEdition: "en",
  hadithApiUrl: "https://api.sunnah.com/v1",
  requestTimeoutMs: 10_000,
  maxQuranResults: 5,
  maxHadithResults: 10,
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Env = Record<string, string | undefined>;

function read(env: Env, name: string): string {
  return env[name]?.trim() ?? "";
}

function parseMode(value: string): FatwaMode {
  if (value === "" || value === "enriched") return "enriched";
  if (value === "basic") return "basic";
  throw new ConfigError(`Invalid FATWA_MODE "${value}" (expected "enriched" or "basic")`);
}

function parseProvider(value: string): LlmProvider {
  if (value === "" || value === "gemini") return "gemini";
  if (value === "openai") return "openai";
  throw new ConfigError(`Invalid LLM_PROVIDER "${value}" (expected "gemini" or "openai")`);
}

function parseTimeout(value: string): number {
  if (value === "") return DEFAULTS.requestTimeoutMs;
  const timeout = Number(value);
  if (!Number.isInteger(timeout) || timeout <= 0) {
    throw new ConfigError(`Invalid REQUEST_TIMEOUT_MS "${value}" (expected a positive integer)`);
  }
  return timeout;
}

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

/**
 * Build the configuration from environment variables.
 * Throws ConfigError naming the first missing or malformed variable.
 */
export function loadConfig(env: Env): Readonly<FatwaConfig> {
  const mode = parseMode(read(env, "FATWA_MODE"));
  const provider = parseProvider(read(env, "LLM_PROVIDER"));

  const geminiApiKey = read(env, "GOOGLE_API_KEY");
  const openaiApiKey = read(env, "OPENAI_API_KEY");
  const hadithApiKey = read(env, "HADITH_API_KEY");

  if (provider === "gemini" && !geminiApiKey) {
    throw new ConfigError("Missing GOOGLE_API_KEY");
  }
  if (provider === "openai" && !openaiApiKey) {
    throw new ConfigError("Missing OPENAI_API_KEY");
  }

  const config: FatwaConfig = {
    mode,
    requestTimeoutMs: parseTimeout(read(env, "REQUEST_TIMEOUT_MS")),
    llm: {
      provider,
      geminiApiKey,
      geminiApiUrl: read(env, "GEMINI_API_URL") || DEFAULTS.geminiApiUrl,
      openaiApiKey,
      openaiModel: read(env, "OPENAI_MODEL") || DEFAULTS.openaiModel,
    },
    quran: {
      baseUrl: stripTrailingSlash(read(env, "QURAN_API_URL") || DEFAULTS.quranApiUrl),
      edition: read(env, "QURAN_EDITION") || DEFAULTS.quranEdition,
      maxResults: DEFAULTS.maxQuranResults,
    },
    hadith: {
      baseUrl: stripTrailingSlash(read(env, "HADITH_API_URL") || DEFAULTS.hadithApiUrl),
      apiKey: hadithApiKey,
      maxResults: DEFAULTS.maxHadithResults,
    },
  };

  return Object.freeze({
    ...config,
    llm: Object.freeze(config.llm),
    quran: Object.freeze(config.quran),
    hadith: Object.freeze(config.hadith),
  });
}

// Lazy initialization
let cachedConfig: Readonly<FatwaConfig> | null = null;

export function getConfig(): Readonly<FatwaConfig> {
  if (!cachedConfig) {
    cachedConfig = loadConfig(process.env);
    console.log(
      `[Config] Loaded (mode: ${cachedConfig.mode}, provider: ${cachedConfig.llm.provider})`
    );
  }
  return cachedConfig;
}
