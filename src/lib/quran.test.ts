import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { loadConfig } from "./config";
import { fetchQuranReferences, parseQuranMatches } from "./quran";

const config = loadConfig({
  GOOGLE_API_KEY: "test-google-key",
  HADITH_API_KEY: "test-hadith-key",
});

function match(ayah: number, text?: string) {
  return {
    number: 185 + ayah,
    text,
    edition: { identifier: "en.sahih", language: "en" },
    surah: { number: 2, name: "surah name", englishName: "Al-Baqarah" },
    numberInSurah: ayah,
  };
}

function searchReply(matches: unknown[]) {
  return { code: 200, status: "OK", data: { count: matches.length, matches } };
}

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { "Content-Type": "application/json" },
  });
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("parseQuranMatches", () => {
  it("maps a match to a reference", () => {
    expect(parseQuranMatches(searchReply([match(183, "Fasting is prescribed for you")]), 5)).toEqual([
      {
        surah: "Al-Baqarah",
        ayat: "183",
        arabic: "Arabic text not available",
        english: "Fasting is prescribed for you",
      },
    ]);
  });

  it("uses placeholders for missing fields", () => {
    expect(parseQuranMatches(searchReply([{}]), 5)).toEqual([
      {
        surah: "Unknown Surah",
        ayat: "?",
        arabic: "Arabic text not available",
        english: "Translation not available",
      },
    ]);
  });

  it("returns an empty list for replies without matches", () => {
    expect(parseQuranMatches({}, 5)).toEqual([]);
    expect(parseQuranMatches({ data: "Nothing found" }, 5)).toEqual([]);
  });
});

describe("fetchQuranReferences", () => {
  it("searches the joined keywords in one request", async () => {
    const fetchFn = vi
      .fn<typeof fetch>()
      .mockImplementation(async () => jsonResponse(searchReply([match(183, "Fasting is prescribed")])));

    const result = await fetchQuranReferences(["ruling", "fasting"], config, fetchFn);

    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(fetchFn.mock.calls[0][0]).toBe(
      "https://api.alquran.cloud/v1/search/ruling%20fasting/all/en"
    );
    expect(result).toEqual({
      ok: true,
      value: [
        {
          surah: "Al-Baqarah",
          ayat: "183",
          arabic: "Arabic text not available",
          english: "Fasting is prescribed",
        },
      ],
    });
  });

  it("keeps at most five verses", async () => {
    const matches = Array.from({ length: 8 }, (_, i) => match(i + 1, `verse ${i + 1}`));
    const fetchFn = vi.fn<typeof fetch>().mockImplementation(async () => jsonResponse(searchReply(matches)));

    const result = await fetchQuranReferences(["patience"], config, fetchFn);

    expect(result.ok && result.value.map((ref) => ref.ayat)).toEqual(["1", "2", "3", "4", "5"]);
  });

  it("queries with an empty term when there are no keywords", async () => {
    const fetchFn = vi.fn<typeof fetch>().mockImplementation(async () => jsonResponse(searchReply([])));

    await fetchQuranReferences([], config, fetchFn);

    expect(fetchFn.mock.calls[0][0]).toBe("https://api.alquran.cloud/v1/search//all/en");
  });

  it("returns the failure detail", async () => {
    const fetchFn = vi
      .fn<typeof fetch>()
      .mockImplementation(async () => new Response("", { status: 404, statusText: "Not Found" }));

    const result = await fetchQuranReferences(["ruling"], config, fetchFn);

    expect(result).toEqual({ ok: false, error: "HTTP 404 Not Found" });
  });
});
