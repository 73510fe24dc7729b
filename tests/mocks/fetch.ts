import { vi } from "vitest";

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

export function statusResponse(status: number, statusText = ""): Response {
  return new Response(null, { status, statusText });
}

/**
 * Replace global fetch with a handler keyed on the request URL.
 * Restore with vi.unstubAllGlobals().
 */
export function stubFetch(handler: (url: string, init?: RequestInit) => Response | Promise<Response>) {
  const mock = vi.fn((input: string | URL | Request, init?: RequestInit) => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.toString() : input.url;
    return Promise.resolve(handler(url, init));
  });
  vi.stubGlobal("fetch", mock);
  return mock;
}

export function fakeSleep() {
  return vi.fn((_ms: number) => Promise.resolve());
}
