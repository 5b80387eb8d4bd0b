/**
 * Small fetch helpers shared by the upstream API clients
 */

export type FetchFn = typeof fetch;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Fetch a URL and parse its JSON body.
 * Throws on non-2xx responses, timeouts and bodies that are not JSON.
 */
export async function fetchJson(
  fetchFn: FetchFn,
  url: string,
  init: RequestInit,
  timeoutMs: number
): Promise<unknown> {
  const response = await fetchFn(url, {
    ...init,
    signal: AbortSignal.timeout(timeoutMs),
  });

  if (!response.ok) {
    // The URL is left out: it may carry an API key
    throw new Error(`HTTP ${response.status} ${response.statusText}`.trim());
  }

  return response.json();
}

/**
 * Read a string or number field as text, falling back to a placeholder
 */
export function textField(
  source: Record<string, unknown>,
  key: string,
  placeholder: string
): string {
  const value = source[key];
  if (typeof value === "string" && value.trim() !== "") return value;
  if (typeof value === "number") return String(value);
  return placeholder;
}
