/**
 * Prompt templates sent to the language model
 */

function scholarInstruction(question: string, fiqh: string): string {
  return (
    `You are an Islamic scholar specializing in ${fiqh} Fiqh. Answer this question: '${question}' ` +
    `based on the Quran, Hadith, and ${fiqh}-specific books. Provide references with narrators, ` +
    `authors, and dates where possible.`
  );
}

/**
 * Prompt for the enriched answer; asks for **bold** emphasis so the
 * formatter can turn it into <strong> tags.
 */
export function buildFatwaPrompt(question: string, fiqh: string): string {
  return (
    scholarInstruction(question, fiqh) +
    ` Use **bold** to highlight key terms, rulings, and the names of your sources.`
  );
}

export function buildBasicPrompt(question: string, fiqh: string): string {
  return scholarInstruction(question, fiqh);
}
