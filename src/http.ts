import { fetch } from 'undici';

export interface HttpRequestInit {
  method: string;
  headers: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

export interface HttpResponse {
  ok: boolean;
  status: number;
  headers: { get(name: string): string | null };
  json(): Promise<unknown>;
  text(): Promise<string>;
}

/** The slice of fetch the outbound HTTP clients use; tests pass a stand-in. */
export type HttpFetch = (url: string, init: HttpRequestInit) => Promise<HttpResponse>;

export const defaultFetch: HttpFetch = fetch;

export async function safeReadBody(response: HttpResponse): Promise<unknown> {
  const contentType = response.headers.get('content-type') ?? '';
  if (contentType.includes('application/json')) {
    try {
      return await response.json();
    } catch (error) {
      return `<<invalid json body: ${String(error)}>>`;
    }
  }
  try {
    return await response.text();
  } catch (e) {
    return `<<failed to read response body: ${String(e)}>>`;
  }
}

export function truncateForLog(value: unknown, max = 800): string {
  let s: string;
  try {
    s = typeof value === 'string' ? value : JSON.stringify(value);
  } catch {
    return '[unserializable]';
  }
  if (s === undefined) return String(value);
  if (s.length <= max) return s;
  return `${s.slice(0, max)}…(truncated)`;
}

export function isAbortError(err: unknown): boolean {
  return (
    err instanceof Error &&
    (err.name === 'AbortError' || /aborted|AbortError/i.test(err.message))
  );
}
