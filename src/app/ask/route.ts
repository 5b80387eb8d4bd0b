/**
 * Ask API Route
 *
 * Takes `{ question, fiqh }` and answers with `{ response }`, where
 * `response` is an HTML fragment ready to be placed in the chat page.
 */

import { NextRequest, NextResponse } from "next/server";
import { ConfigError, getConfig } from "@/lib/config";
import { createFatwaDependencies, handleAsk } from "@/lib/fatwa";
import type { FatwaDependencies } from "@/lib/fatwa";
import { formatParagraph } from "@/lib/formatting";
import { parseAskRequest, VALIDATION_MESSAGES } from "@/lib/validation";
import type { AskAPIResponse } from "@/lib/types";

// Lazy initialization
let dependencies: FatwaDependencies | null = null;

function getDependencies(): FatwaDependencies {
  if (!dependencies) {
    dependencies = createFatwaDependencies(getConfig());
  }
  return dependencies;
}

export async function POST(request: NextRequest) {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    return NextResponse.json<AskAPIResponse>(
      { response: formatParagraph(VALIDATION_MESSAGES.InvalidInput) },
      { status: 400 }
    );
  }

  try {
    const outcome = await handleAsk(parseAskRequest(body), getDependencies);
    return NextResponse.json<AskAPIResponse>(outcome.body, { status: outcome.status });
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`[Ask] Configuration error: ${error.message}`);
      return NextResponse.json<AskAPIResponse>(
        { response: formatParagraph("Service configuration error.") },
        { status: 500 }
      );
    }

    console.error("[Ask] Error processing request:", error);
    return NextResponse.json<AskAPIResponse>(
      { response: formatParagraph("Failed to process your question. Please try again.") },
      { status: 500 }
    );
  }
}

// Health check endpoint
export async function GET() {
  return NextResponse.json({
    status: "ok",
    service: "fatwa-assistant",
    timestamp: new Date().toISOString(),
  });
}
