import { vi } from "vitest";

/**
 * Minimal stand-in for a fetch Response
 */
export function textResponse(body: string, status = 200) {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: status === 200 ? "OK" : "Error",
    text: () => Promise.resolve(body),
  };
}

export function jsonResponse(body: unknown, status = 200) {
  return textResponse(JSON.stringify(body), status);
}

/**
 * Replace global fetch with a mock answering the given responses in order
 */
export function stubFetch(...responses: ReturnType<typeof textResponse>[]) {
  const fetchMock = vi.fn();
  for (const response of responses) {
    fetchMock.mockResolvedValueOnce(response);
  }
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

/**
 * URL passed to the nth fetch call
 */
export function requestedUrl(fetchMock: ReturnType<typeof vi.fn>, call = 0): string {
  return String(fetchMock.mock.calls[call]?.[0]);
}
