/**
 * HTML formatting for answers and reference lists
 */

import { DEFAULTS } from "./config";
import type { HadithReference, QuranReference } from "./types";

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

/**
 * Convert **bold** markdown spans to <strong> tags
 */
export function formatText(text: string): string {
  return text.replace(/\*\*(.+?)\*\*/g, "<strong>$1</strong>");
}

/**
 * Basic-mode formatting: bold every literal "Quran" and "Hadith"
 */
export function highlightReferences(text: string): string {
  return text
    .replaceAll("Quran", "<strong>Quran</strong>")
    .replaceAll("Hadith", "<strong>Hadith</strong>");
}

export function formatParagraph(text: string): string {
  return `<p>${text}</p>`;
}

function quranItem(ref: QuranReference): string {
  return (
    `<li style="margin-bottom: 10px;">` +
    `<strong>Surah ${escapeHtml(ref.surah)}, Ayah ${escapeHtml(ref.ayat)}</strong><br>` +
    `<span dir="rtl" style="font-size: 1.2em;">${escapeHtml(ref.arabic)}</span><br>` +
    `<em>${escapeHtml(ref.english)}</em>` +
    `</li>`
  );
}

function hadithItem(ref: HadithReference): string {
  return (
    `<li style="margin-bottom: 10px;">` +
    `<strong>${escapeHtml(ref.book)} #${escapeHtml(ref.number)}</strong> ` +
    `(Narrated by ${escapeHtml(ref.narrator)})<br>` +
    `<span dir="rtl" style="font-size: 1.2em;">${escapeHtml(ref.arabic)}</span><br>` +
    `<em>${escapeHtml(ref.english)}</em>` +
    `</li>`
  );
}

export interface FatwaResponseParts {
  question: string;
  fiqh: string;
  answer: string;
  quran: QuranReference[];
  hadith: HadithReference[];
}

/**
 * Assemble the full answer fragment: heading, question, answer,
 * then the Quran (max 5) and Hadith (max 10) reference lists.
 */
export function formatFatwaResponse(parts: FatwaResponseParts): string {
  const quranItems = parts.quran.slice(0, DEFAULTS.maxQuranResults).map(quranItem);
  const hadithItems = parts.hadith.slice(0, DEFAULTS.maxHadithResults).map(hadithItem);

  return [
    `<div style="font-family: Arial, sans-serif; line-height: 1.6;">`,
    `<h2 style="color: #2c3e50;">Fatwa according to ${escapeHtml(parts.fiqh)} Fiqh</h2>`,
    `<p><strong>Question:</strong> ${escapeHtml(parts.question)}</p>`,
    `<div style="margin: 15px 0;"><strong>Answer:</strong>`,
    formatParagraph(formatText(escapeHtml(parts.answer))),
    `</div>`,
    `<h3 style="color: #16a085;">Quran References</h3>`,
    `<ul>${quranItems.join("")}</ul>`,
    `<h3 style="color: #16a085;">Hadith References</h3>`,
    `<ul>${hadithItems.join("")}</ul>`,
    `</div>`,
  ].join("");
}
