/**
 * Request validation for the ask endpoint
 */

import type { AskRequest, ValidationError } from "./types";

// A question must mention at least one of these to be answered
export const ISLAMIC_KEYWORDS = [
  "islam",
  "quran",
  "hadith",
  "fiqh",
  "fatwa",
  "prayer",
  "fasting",
  "zakat",
  "hajj",
] as const;

export const VALIDATION_MESSAGES: Record<ValidationError, string> = {
  InvalidInput: "Please provide both a question and a Fiqh selection.",
  OffTopic: "I can only assist with Islamic questions.",
};

export type ValidationResult =
  | { valid: true; data: AskRequest }
  | { valid: false; error: ValidationError; message: string };

/**
 * Case-insensitive substring match against the keyword allowlist
 */
export function isIslamicQuestion(question: string): boolean {
  const lowered = question.toLowerCase();
  return ISLAMIC_KEYWORDS.some((keyword) => lowered.includes(keyword));
}

export function validateQuestion(question: string, fiqh: string): ValidationResult {
  if (!question || !fiqh) {
    return {
      valid: false,
      error: "InvalidInput",
      message: VALIDATION_MESSAGES.InvalidInput,
    };
  }

  if (!isIslamicQuestion(question)) {
    return {
      valid: false,
      error: "OffTopic",
      message: VALIDATION_MESSAGES.OffTopic,
    };
  }

  return { valid: true, data: { question, fiqh } };
}

/**
 * Read question and fiqh from an untrusted JSON body.
 * Anything that is not a string reads as empty.
 */
export function parseAskRequest(body: unknown): AskRequest {
  if (!body || typeof body !== "object") {
    return { question: "", fiqh: "" };
  }

  const { question, fiqh } = body as Record<string, unknown>;

  return {
    question: typeof question === "string" ? question.trim() : "",
    fiqh: typeof fiqh === "string" ? fiqh.trim() : "",
  };
}
