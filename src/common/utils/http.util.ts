/**
 * Runs `fetch` and `read` under one abort timer, so a slow body counts
 * against the same budget as a slow connect.
 */
export async function fetchWithTimeout<T>(
  url: string,
  init: RequestInit,
  timeoutMs: number,
  read: (res: Response) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const res = await fetch(url, { ...init, signal: controller.signal });
    return await read(res);
  } finally {
    clearTimeout(timeout);
  }
}

/** Parsed JSON body, or an `HTTP <status>` error for non-2xx answers. */
export async function readJson(res: Response): Promise<unknown> {
  if (!res.ok) {
    throw new Error(`HTTP ${res.status}`);
  }
  const body: unknown = await res.json();
  return body;
}

/** Host and path for log lines; query strings can carry tokens. */
export function describeUrl(url: string): string {
  try {
    const parsed = new URL(url);
    return `host=${parsed.hostname} path=${parsed.pathname.slice(0, 40)}`;
  } catch {
    return `url=${url.slice(0, 80)}`;
  }
}
