/**
 * Ask a question from the command line
 *
 * Runs the same pipeline as POST /ask and prints the status and HTML.
 *
 * Usage:
 *   npm run ask -- "What is the ruling on fasting while travelling?" Hanafi
 *
 * Environment variables (read from .env.local, then .env):
 *   GOOGLE_API_KEY - Gemini API key (or OPENAI_API_KEY with LLM_PROVIDER=openai)
 *   HADITH_API_KEY - sunnah.com API key (enriched mode)
 *   FATWA_MODE     - "enriched" (default) or "basic"
 */

import { resolve } from "path";
import { config } from "dotenv";
import { ConfigError, loadConfig } from "../src/lib/config";
import { createFatwaDependencies, handleAsk } from "../src/lib/fatwa";

// Load environment variables, .env.local taking precedence
config({ path: resolve(__dirname, "../.env.local") });
config({ path: resolve(__dirname, "../.env") });

async function main() {
  const [question = "", fiqh = ""] = process.argv.slice(2);

  const outcome = await handleAsk({ question: question.trim(), fiqh: fiqh.trim() }, () =>
    createFatwaDependencies(loadConfig(process.env))
  );

  console.log(`Status: ${outcome.status}`);
  console.log(outcome.body.response);

  if (outcome.status !== 200) {
    process.exit(1);
  }
}

main().catch((error) => {
  if (error instanceof ConfigError) {
    console.error(`Configuration error: ${error.message}`);
  } else {
    console.error("Fatal error:", error);
  }
  process.exit(1);
});
