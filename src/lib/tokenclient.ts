import process from "node:process";
import { z } from "zod";
import { buildBasicAuth } from "./basic-auth";
import { DEFAULT_API_BASE, DEFAULT_USER_AGENT } from "./config";
import { OtpAcquisitionError, RemoteAuthorizationError, TransportError, ValidationError } from "./errors";
import type { Logger } from "./log";
import type { OtpCallback } from "./otp";
import type { AuthorizationRecord, AuthorizationRequest, Credentials, OtpChallenge } from "./types";

export const OTP_HEADER = "X-GitHub-OTP";

const AuthorizationRecordSchema = z.object({
  id: z.number().int().positive(),
  token: z.string(),
  note: z.string().nullable().default(null),
  note_url: z.string().nullable().default(null),
  scopes: z.array(z.string()).default([]),
  app: z.object({
    name: z.string(),
    url: z.string(),
    client_id: z.string().optional(),
  }),
  created_at: z.string(),
  updated_at: z.string(),
  url: z.string(),
});

export type TokenClientOptions = {
  apiBase?: string;
  userAgent?: string;
  // no timeout when unset or 0
  timeoutMs?: number;
  fetch?: typeof fetch;
  logger?: Logger;
};

type Outcome =
  | { kind: "success"; record: AuthorizationRecord }
  | { kind: "otp"; challenge: OtpChallenge; error: RemoteAuthorizationError }
  | { kind: "failure"; error: RemoteAuthorizationError };

const silent: Logger = { debug: () => undefined };

/**
 * Creates OAuth authorizations with the non-web flow: one Basic-authenticated
 * POST to /authorizations, plus at most one resend carrying a one-time
 * password when the account has two-factor authentication enabled.
 */
export class TokenClient {
  readonly apiBase: string;
  readonly userAgent: string;
  readonly timeoutMs?: number;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(opts: TokenClientOptions = {}) {
    this.apiBase = TokenClient.normalizeBase(opts.apiBase ?? DEFAULT_API_BASE);
    this.userAgent = opts.userAgent ?? DEFAULT_USER_AGENT;
    this.timeoutMs = opts.timeoutMs;
    this.fetchImpl = opts.fetch ?? ((input, init) => fetch(input, init));
    this.logger = opts.logger ?? silent;
  }

  // Credentials go over the wire, so only https bases are accepted.
  static normalizeBase(base: string): string {
    let url: URL;
    try {
      url = new URL(base);
    } catch {
      throw new ValidationError([`illegal_api_url: ${base}`]);
    }
    if (url.protocol !== "https:") {
      throw new ValidationError([`illegal_api_url: ${base} (https required)`]);
    }
    return url.href.replace(/\/+$/, "");
  }

  get endpoint(): string {
    return `${this.apiBase}/authorizations`;
  }

  buildHeaders(credentials: Credentials, otp?: string): Record<string, string> {
    const headers: Record<string, string> = {
      "Accept": "application/vnd.github+json",
      "Authorization": buildBasicAuth(credentials.user, credentials.password),
      "Content-Type": "application/json",
      "User-Agent": this.userAgent,
    };
    if (otp !== undefined) {
      headers[OTP_HEADER] = otp;
    }
    return headers;
  }

  // scopes is always sent, even when empty
  buildBody(request: AuthorizationRequest): string {
    const body: Record<string, unknown> = { scopes: request.scopes };
    if (request.note !== undefined) body.note = request.note;
    if (request.note_url !== undefined) body.note_url = request.note_url;
    if (request.client_id !== undefined) body.client_id = request.client_id;
    if (request.client_secret !== undefined) body.client_secret = request.client_secret;
    return JSON.stringify(body);
  }

  async issue(
    credentials: Credentials,
    request: AuthorizationRequest,
    otpCallback?: OtpCallback,
  ): Promise<AuthorizationRecord> {
    TokenClient.assertTlsVerification();

    const body = this.buildBody(request);

    const first = await this.send(credentials, body);
    if (first.kind === "success") return first.record;
    if (first.kind === "failure") throw first.error;

    this.logger.debug(
      `Two-factor code required${first.challenge.delivery ? ` (${first.challenge.delivery})` : ""}`,
    );

    const raw = otpCallback ? await otpCallback(first.challenge) : undefined;
    const otp = raw?.trim();
    if (!otp) {
      throw new OtpAcquisitionError();
    }

    const second = await this.send(credentials, body, otp);
    if (second.kind === "success") return second.record;

    // A second challenge means the code was rejected; never loop.
    throw second.error;
  }

  static assertTlsVerification() {
    if (process.env["NODE_TLS_REJECT_UNAUTHORIZED"] === "0") {
      throw new TransportError(
        "TLS certificate verification is disabled (NODE_TLS_REJECT_UNAUTHORIZED=0); refusing to send credentials",
      );
    }
  }

  static parseChallenge(res: Response): OtpChallenge | null {
    if (res.status !== 401) return null;

    const marker = res.headers.get(OTP_HEADER);
    if (!marker || !/^required\b/i.test(marker.trim())) return null;

    const delivery = marker.split(";")[1]?.trim() || undefined;
    return { status: res.status, reason: res.statusText, delivery };
  }

  private async send(credentials: Credentials, body: string, otp?: string): Promise<Outcome> {
    const headers = this.buildHeaders(credentials, otp);

    const controller = new AbortController();
    const timeoutId = this.timeoutMs ? setTimeout(() => controller.abort(), this.timeoutMs) : undefined;

    try {
      const start = Date.now();
      let res: Response;
      try {
        res = await this.fetchImpl(this.endpoint, {
          method: "POST",
          headers,
          body,
          // a redirect would resend the body (client_secret, OTP) to another URL
          redirect: "manual",
          signal: controller.signal,
        });
      } catch (e) {
        this.logger.debug(`POST ${this.endpoint} failed: ${String(e)}`);
        throw this.transportError(controller.signal, "failed", e);
      }

      if (res.type === "opaqueredirect" || (res.status >= 300 && res.status < 400)) {
        const location = res.headers.get("location") ?? "(no location)";
        this.logger.debug(`POST ${this.endpoint}: ${res.status} redirect to ${location} not followed`);
        return {
          kind: "failure",
          error: new RemoteAuthorizationError(
            res.status,
            res.statusText,
            `refusing to follow redirect to ${location}`,
          ),
        };
      }

      const text = await this.readBody(res, controller.signal);

      this.logger.debug(
        `POST ${this.endpoint}${otp !== undefined ? " (with OTP)" : ""}: ${res.status} ${res.statusText} (took ${
          Date.now() - start
        }ms)`,
      );

      if (res.ok) {
        return { kind: "success", record: this.parseRecord(res, text) };
      }

      const challenge = TokenClient.parseChallenge(res);
      if (challenge) {
        return { kind: "otp", challenge, error: this.errorForResponse(res, text) };
      }

      return { kind: "failure", error: this.errorForResponse(res, text) };
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async readBody(res: Response, signal: AbortSignal): Promise<string> {
    try {
      return await res.text();
    } catch (e) {
      throw this.transportError(signal, "failed while reading the response", e);
    }
  }

  private transportError(signal: AbortSignal, what: string, cause: unknown): TransportError {
    const message = signal.aborted
      ? `request to ${this.endpoint} timed out after ${this.timeoutMs}ms`
      : `request to ${this.endpoint} ${what}`;
    return new TransportError(message, cause);
  }

  private parseRecord(res: Response, text: string): AuthorizationRecord {
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      throw new RemoteAuthorizationError(res.status, res.statusText, `response is not JSON: ${text}`);
    }

    const parsed = AuthorizationRecordSchema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
      throw new RemoteAuthorizationError(
        res.status,
        res.statusText,
        `malformed authorization record: ${issues.join("; ")}`,
      );
    }
    return parsed.data;
  }

  errorForResponse(res: Response, text: string): RemoteAuthorizationError {
    let message = text;
    try {
      const json: unknown = JSON.parse(text);
      if (json != null && typeof json === "object" && "message" in json && typeof json.message === "string") {
        message = json.message;
      }
    } catch { /* not JSON, keep raw body */ }

    return new RemoteAuthorizationError(res.status, res.statusText, message);
  }
}
