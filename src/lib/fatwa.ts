/**
 * Ask pipeline: validate -> prompt -> LLM -> references -> HTML
 *
 * 1. Validates the question and fiqh selection (400 on failure)
 * 2. Sends the prompt to the language model (500 on failure)
 * 3. In enriched mode, looks up Quran and Hadith references; a failed
 *    lookup becomes a placeholder entry instead of failing the request
 * 4. Returns the HTML fragment wrapped in `{ response }`
 */

import type { FatwaConfig } from "./config";
import { createLlmClient } from "./llm";
import type { LlmClient } from "./llm";
import { fetchQuranReferences } from "./quran";
import { fetchHadithReferences } from "./hadith";
import { extractKeywords } from "./keywords";
import { buildBasicPrompt, buildFatwaPrompt } from "./prompt";
import { escapeHtml, formatFatwaResponse, formatParagraph, highlightReferences } from "./formatting";
import { validateQuestion } from "./validation";
import type {
  AskOutcome,
  AskRequest,
  AskStatus,
  HadithReference,
  QuranReference,
  UpstreamResult,
} from "./types";

export interface FatwaDependencies {
  config: Readonly<FatwaConfig>;
  llm: LlmClient;
  fetchQuran(keywords: string[]): Promise<UpstreamResult<QuranReference[]>>;
  fetchHadith(keywords: string[]): Promise<UpstreamResult<HadithReference[]>>;
}

export function createFatwaDependencies(config: Readonly<FatwaConfig>): FatwaDependencies {
  return {
    config,
    llm: createLlmClient(config),
    fetchQuran: (keywords) => fetchQuranReferences(keywords, config),
    fetchHadith: (keywords) => fetchHadithReferences(keywords, config),
  };
}

export function quranPlaceholder(error: string): QuranReference {
  return {
    surah: "unavailable",
    ayat: "-",
    arabic: "",
    english: error,
  };
}

export function hadithPlaceholder(error: string): HadithReference {
  return {
    book: "Hadith unavailable",
    number: "-",
    narrator: "unknown",
    arabic: "",
    english: error,
  };
}

function respond(status: AskStatus, response: string): AskOutcome {
  return { status, body: { response } };
}

/**
 * Handle one ask request. Dependencies are resolved only once the input
 * has passed validation.
 */
export async function handleAsk(
  input: AskRequest,
  resolveDependencies: () => FatwaDependencies
): Promise<AskOutcome> {
  const validation = validateQuestion(input.question, input.fiqh);
  if (!validation.valid) {
    console.log(`[Ask] Rejected (${validation.error})`);
    return respond(400, formatParagraph(validation.message));
  }

  const { question, fiqh } = validation.data;
  const deps = resolveDependencies();
  const { mode } = deps.config;

  console.log(`[Ask] Processing question: "${question.substring(0, 50)}..." (fiqh: ${fiqh}, mode: ${mode})`);

  const prompt = mode === "basic" ? buildBasicPrompt(question, fiqh) : buildFatwaPrompt(question, fiqh);
  const answer = await deps.llm.generate(prompt);

  if (!answer.ok) {
    console.error(`[Ask] LLM failed: ${answer.error}`);
    return respond(500, formatParagraph(`Error fetching response: ${escapeHtml(answer.error)}`));
  }

  if (mode === "basic") {
    return respond(200, highlightReferences(escapeHtml(answer.value)));
  }

  const keywords = extractKeywords(question);
  console.log(`[Ask] Reference keywords: ${JSON.stringify(keywords)}`);

  const quran = await deps.fetchQuran(keywords);
  const hadith = await deps.fetchHadith(keywords);

  const html = formatFatwaResponse({
    question,
    fiqh,
    answer: answer.value,
    quran: quran.ok ? quran.value : [quranPlaceholder(quran.error)],
    hadith: hadith.ok ? hadith.value : [hadithPlaceholder(hadith.error)],
  });

  return respond(200, html);
}
