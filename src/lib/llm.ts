/**
 * Language model client
 *
 * Sends one prompt to the configured provider and returns the answer text.
 * Upstream failures come back as `{ ok: false }` results, never as thrown errors.
 */

import OpenAI from "openai";
import type { FatwaConfig } from "./config";
import { errorMessage, fetchJson, isRecord } from "./http";
import type { FetchFn } from "./http";
import type { UpstreamResult } from "./types";

export interface LlmClient {
  generate(prompt: string): Promise<UpstreamResult<string>>;
}

export const NO_RESPONSE_TEXT = "No response text received";

/**
 * Pull candidates[0].content.parts[0].text out of a generateContent reply
 */
export function extractGeminiText(data: unknown): string | null {
  if (!isRecord(data) || !Array.isArray(data.candidates)) return null;

  const candidate: unknown = data.candidates[0];
  if (!isRecord(candidate) || !isRecord(candidate.content)) return null;

  const parts = candidate.content.parts;
  if (!Array.isArray(parts)) return null;

  const part: unknown = parts[0];
  if (!isRecord(part) || typeof part.text !== "string") return null;

  return part.text;
}

function createGeminiClient(config: Readonly<FatwaConfig>, fetchFn: FetchFn): LlmClient {
  return {
    async generate(prompt) {
      const url = new URL(config.llm.geminiApiUrl);
      url.searchParams.set("key", config.llm.geminiApiKey);

      try {
        const data = await fetchJson(
          fetchFn,
          url.toString(),
          {
            method: "POST",
            headers: { "Content-Type": "application/json" },
            body: JSON.stringify({ contents: [{ parts: [{ text: prompt }] }] }),
          },
          config.requestTimeoutMs
        );

        const text = extractGeminiText(data);
        if (text === null) {
          console.error("[LLM] Gemini reply had no candidate text");
          return { ok: false, error: NO_RESPONSE_TEXT };
        }
        return { ok: true, value: text };
      } catch (error) {
        console.error("[LLM] Gemini request failed:", error);
        return { ok: false, error: errorMessage(error) };
      }
    },
  };
}

function createOpenAIClient(config: Readonly<FatwaConfig>): LlmClient {
  const client = new OpenAI({
    apiKey: config.llm.openaiApiKey,
    timeout: config.requestTimeoutMs,
    maxRetries: 0,
  });

  return {
    async generate(prompt) {
      try {
        const response = await client.chat.completions.create({
          model: config.llm.openaiModel,
          messages: [{ role: "user", content: prompt }],
        });

        const text = response.choices[0]?.message?.content;
        if (text === null || text === undefined) {
          console.error("[LLM] OpenAI reply had no message content");
          return { ok: false, error: NO_RESPONSE_TEXT };
        }
        return { ok: true, value: text };
      } catch (error) {
        console.error("[LLM] OpenAI request failed:", error);
        return { ok: false, error: errorMessage(error) };
      }
    },
  };
}

export function createLlmClient(
  config: Readonly<FatwaConfig>,
  fetchFn: FetchFn = fetch
): LlmClient {
  if (config.llm.provider === "openai") {
    return createOpenAIClient(config);
  }
  return createGeminiClient(config, fetchFn);
}
