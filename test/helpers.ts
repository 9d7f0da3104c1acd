/**
 * Test helpers: canned provider responses and a scripted fetch.
 */

import { vi } from "vitest";
import type { AuthorizationRecord } from "../src/lib/types";

type FetchArgs = Parameters<typeof fetch>;

export const ENDPOINT = "https://api.github.com/authorizations";

export function authorizationRecord(overrides: Partial<AuthorizationRecord> = {}): AuthorizationRecord {
  return {
    id: 1234,
    token: "abc123",
    note: "test note",
    note_url: null,
    scopes: ["repo"],
    app: {
      name: "test note (API)",
      url: "https://developer.github.com/v3/oauth_authorizations/",
    },
    created_at: "2024-01-02T03:04:05Z",
    updated_at: "2024-01-02T03:04:05Z",
    url: "https://api.github.com/authorizations/1234",
    ...overrides,
  };
}

export function jsonResponse(
  status: number,
  statusText: string,
  body: unknown,
  headers: Record<string, string> = {},
): Response {
  return new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { "Content-Type": "application/json; charset=utf-8", ...headers },
  });
}

export function created(record: AuthorizationRecord = authorizationRecord()): Response {
  return jsonResponse(201, "Created", record);
}

export function otpChallenge(delivery = "app"): Response {
  return jsonResponse(
    401,
    "Unauthorized",
    { message: "Must specify two-factor authentication OTP code." },
    { "X-GitHub-OTP": `required; ${delivery}` },
  );
}

export function badCredentials(): Response {
  return jsonResponse(401, "Unauthorized", { message: "Bad credentials" });
}

/**
 * A fetch that answers each call with the next queued response and fails
 * the test on any call beyond them.
 */
export function scriptedFetch(...responses: Response[]) {
  const queue = [...responses];
  return vi.fn(async (input: FetchArgs[0], _init?: FetchArgs[1]): Promise<Response> => {
    const next = queue.shift();
    if (!next) throw new Error(`Unexpected fetch: ${String(input)}`);
    return next;
  });
}

export function requestHeaders(init: FetchArgs[1]): Headers {
  return new Headers(init?.headers);
}

export function requestBody(init: FetchArgs[1]): unknown {
  return JSON.parse(String(init?.body));
}
