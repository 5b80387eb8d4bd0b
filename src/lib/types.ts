/**
 * Shared types for the fatwa assistant
 */

// API request body
export interface AskRequest {
  question: string;
  fiqh: string;
}

// API response: `response` is always an HTML fragment
export interface AskAPIResponse {
  response: string;
}

export type AskStatus = 200 | 400 | 500;

export interface AskOutcome {
  status: AskStatus;
  body: AskAPIResponse;
}

// Quran verse as shown in the references list
export interface QuranReference {
  surah: string;
  ayat: string; // ayah number kept as text
  arabic: string;
  english: string;
}

// Hadith as shown in the references list
export interface HadithReference {
  book: string;
  number: string;
  narrator: string;
  arabic: string;
  english: string;
}

// Outcome of a call to one of the third-party APIs
export type UpstreamResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: string };

export type FatwaMode = "enriched" | "basic";

export type LlmProvider = "gemini" | "openai";

export type ValidationError = "InvalidInput" | "OffTopic";
