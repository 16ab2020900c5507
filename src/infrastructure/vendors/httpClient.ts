/**
 * Shared HTTP client for vendor and chat API calls
 * Uses native fetch with a per-request timeout.
 */

const DEFAULT_TIMEOUT_MS = 30_000

export async function pooledFetch(
  url: string | URL,
  options?: RequestInit,
  timeoutMs: number = DEFAULT_TIMEOUT_MS
): Promise<Response> {
  return fetch(url, {
    ...options,
    signal: options?.signal ?? AbortSignal.timeout(timeoutMs),
  })
}

export function basicAuthHeader(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`).toString("base64")}`
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}
