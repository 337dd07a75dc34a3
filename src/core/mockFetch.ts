import { FetchInit, FetchLike, HttpResponseLike } from "./fetch";

export type MockRoute =
  | { status: number; statusText?: string; body?: string | Uint8Array }
  | { error: Error };

export interface RecordedRequest {
  url: string;
  init: FetchInit;
}

export function mockResponse(body: string | Uint8Array, status = 200, statusText = "OK"): HttpResponseLike {
  const bytes = typeof body === "string" ? new TextEncoder().encode(body) : body.slice();
  return {
    status,
    statusText,
    arrayBuffer: async () => bytes.buffer,
  };
}

export function createMockFetch(routes: Record<string, MockRoute>): { fetchFn: FetchLike; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  const fetchFn: FetchLike = async (url, init) => {
    requests.push({ url, init });
    const route = routes[url];
    if (!route) {
      throw new TypeError("fetch failed", { cause: new Error(`getaddrinfo ENOTFOUND ${new URL(url).hostname}`) });
    }
    if ("error" in route) {
      throw route.error;
    }
    return mockResponse(route.body ?? "", route.status, route.statusText);
  };
  return { fetchFn, requests };
}
