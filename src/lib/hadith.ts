/**
 * Hadith lookups (sunnah.com)
 *
 * The upstream API has no keyword search, so each keyword only triggers a
 * call to the random-hadith endpoint. The results are not topic-filtered.
 */

import type { FatwaConfig } from "./config";
import { errorMessage, fetchJson, isRecord, textField } from "./http";
import type { FetchFn } from "./http";
import type { HadithReference, UpstreamResult } from "./types";

export const HADITH_PLACEHOLDERS = {
  book: "Unknown collection",
  number: "?",
  narrator: "Unknown narrator",
  arabic: "Arabic text not available",
  english: "English text not available",
};

const MAX_LOOKUPS = 2;

export const MISSING_API_KEY = "Missing HADITH_API_KEY";

export function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

const HTML_ENTITIES: Record<string, string> = {
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": '"',
  "&#39;": "'",
  "&#039;": "'",
  "&apos;": "'",
  "&nbsp;": " ",
};

/**
 * Plain text of an HTML body: tags removed, basic entities decoded
 */
export function stripTags(html: string): string {
  return html
    .replace(/<[^>]+>/g, "")
    .replace(/&(?:amp|lt|gt|quot|#0?39|apos|nbsp);/g, (entity) => HTML_ENTITIES[entity] ?? entity)
    .trim();
}

/**
 * "Narrated Abu Huraira: ..." -> "Abu Huraira"
 */
export function extractNarrator(english: string): string | null {
  const match = /^Narrated\s+([^:]+):/i.exec(english);
  return match ? match[1].trim() : null;
}

function bodyText(entry: unknown): string | null {
  if (!isRecord(entry) || typeof entry.body !== "string") return null;
  const text = stripTags(entry.body);
  return text === "" ? null : text;
}

/**
 * Map one random-hadith reply to a reference. Returns null when the reply
 * has no hadith array.
 */
export function parseHadith(data: unknown): HadithReference | null {
  if (!isRecord(data) || !Array.isArray(data.hadith) || data.hadith.length === 0) {
    return null;
  }

  const entries: unknown[] = data.hadith;
  const arabicEntry = entries.find((entry) => isRecord(entry) && entry.lang === "ar");

  const english = bodyText(entries[0]);
  const narrator = english ? extractNarrator(english) : null;

  return {
    book: capitalize(textField(data, "collection", HADITH_PLACEHOLDERS.book)),
    number: textField(data, "hadithNumber", HADITH_PLACEHOLDERS.number),
    narrator: narrator ?? HADITH_PLACEHOLDERS.narrator,
    arabic: bodyText(arabicEntry) ?? HADITH_PLACEHOLDERS.arabic,
    english: english ?? HADITH_PLACEHOLDERS.english,
  };
}

/**
 * One random-hadith request per keyword (at most two), capped at
 * `config.hadith.maxResults` references. Any failed call fails the lookup.
 */
export async function fetchHadithReferences(
  keywords: string[],
  config: Readonly<FatwaConfig>,
  fetchFn: FetchFn = fetch
): Promise<UpstreamResult<HadithReference[]>> {
  const references: HadithReference[] = [];
  const url = `${config.hadith.baseUrl}/hadiths/random`;

  // No key: fail the lookup without calling the API
  if (!config.hadith.apiKey) {
    console.error("[Hadith] Lookup skipped: HADITH_API_KEY is not set");
    return { ok: false, error: MISSING_API_KEY };
  }

  try {
    for (const keyword of keywords.slice(0, MAX_LOOKUPS)) {
      if (references.length >= config.hadith.maxResults) break;

      const data = await fetchJson(
        fetchFn,
        url,
        {
          method: "GET",
          headers: { "X-API-Key": config.hadith.apiKey },
        },
        config.requestTimeoutMs
      );

      const hadith = parseHadith(data);
      if (hadith) {
        references.push(hadith);
      } else {
        console.log(`[Hadith] No hadith in reply for "${keyword}"`);
      }
    }
  } catch (error) {
    console.error("[Hadith] Lookup failed:", error);
    return { ok: false, error: errorMessage(error) };
  }

  console.log(`[Hadith] ${references.length} hadith for ${keywords.length} keywords`);
  return { ok: true, value: references.slice(0, config.hadith.maxResults) };
}
