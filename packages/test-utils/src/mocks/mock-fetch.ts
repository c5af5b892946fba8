/**
 * In-process stand-in for fetch
 */

import { vi } from 'vitest';

export interface MockFetchInit {
  headers: Record<string, string>;
  signal?: AbortSignal;
}

export interface MockResponse {
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
}

export type MockReply = { status: number; body: string } | { error: Error };

export interface MockRoute {
  match: (url: URL, init: MockFetchInit) => boolean;
  reply: MockReply | ((url: URL, init: MockFetchInit) => MockReply);
}

export function textReply(body: string, status = 200): MockReply {
  return { status, body };
}

export function jsonReply(value: unknown, status = 200): MockReply {
  return { status, body: JSON.stringify(value) };
}

export function ndjsonReply(values: unknown[]): MockReply {
  return { status: 200, body: values.map((value) => JSON.stringify(value)).join('\n') };
}

export function networkError(message = 'getaddrinfo ENOTFOUND lichess.org'): MockReply {
  return { error: new TypeError(`fetch failed: ${message}`) };
}

/**
 * Create a fetch replacement that answers from the first matching route.
 * Unmatched requests get a 404.
 */
export function createMockFetch(routes: MockRoute[]) {
  return vi.fn(async (input: string, init: MockFetchInit): Promise<MockResponse> => {
    const url = new URL(input);
    const route = routes.find((candidate) => candidate.match(url, init));
    const reply = route
      ? typeof route.reply === 'function'
        ? route.reply(url, init)
        : route.reply
      : textReply('Not Found', 404);

    if ('error' in reply) {
      throw reply.error;
    }
    return {
      ok: reply.status >= 200 && reply.status < 300,
      status: reply.status,
      statusText: reply.status === 200 ? 'OK' : '',
      text: async () => reply.body,
    };
  });
}

export type MockFetch = ReturnType<typeof createMockFetch>;
