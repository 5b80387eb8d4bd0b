/**
 * Quran verse search (alquran.cloud)
 */

import type { FatwaConfig } from "./config";
import { errorMessage, fetchJson, isRecord, textField } from "./http";
import type { FetchFn } from "./http";
import type { QuranReference, UpstreamResult } from "./types";

export const QURAN_PLACEHOLDERS = {
  surah: "Unknown Surah",
  ayat: "?",
  arabic: "Arabic text not available",
  english: "Translation not available",
};

function toQuranReference(match: unknown): QuranReference {
  if (!isRecord(match)) {
    return { ...QURAN_PLACEHOLDERS };
  }

  const surah = isRecord(match.surah)
    ? textField(match.surah, "englishName", QURAN_PLACEHOLDERS.surah)
    : QURAN_PLACEHOLDERS.surah;

  return {
    surah,
    ayat: textField(match, "numberInSurah", QURAN_PLACEHOLDERS.ayat),
    arabic: textField(match, "arabic", QURAN_PLACEHOLDERS.arabic),
    english: textField(match, "text", QURAN_PLACEHOLDERS.english),
  };
}

/**
 * Parse data.matches from a search reply, keeping at most `limit` entries
 */
export function parseQuranMatches(data: unknown, limit: number): QuranReference[] {
  if (!isRecord(data) || !isRecord(data.data) || !Array.isArray(data.data.matches)) {
    return [];
  }
  return data.data.matches.slice(0, limit).map(toQuranReference);
}

/**
 * Search verses for the given keywords in a single request.
 * The keywords are joined with a space and sent as one path segment.
 */
export async function fetchQuranReferences(
  keywords: string[],
  config: Readonly<FatwaConfig>,
  fetchFn: FetchFn = fetch
): Promise<UpstreamResult<QuranReference[]>> {
  const term = keywords.join(" ");
  const url = `${config.quran.baseUrl}/search/${encodeURIComponent(term)}/all/${config.quran.edition}`;

  try {
    const data = await fetchJson(fetchFn, url, { method: "GET" }, config.requestTimeoutMs);
    const references = parseQuranMatches(data, config.quran.maxResults);
    console.log(`[Quran] "${term}" -> ${references.length} verses`);
    return { ok: true, value: references };
  } catch (error) {
    console.error(`[Quran] Search for "${term}" failed:`, error);
    return { ok: false, error: errorMessage(error) };
  }
}
