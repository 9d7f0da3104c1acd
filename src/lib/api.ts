import { type OtpCallback, promptForOtp } from "./otp";
import { TokenClient } from "./tokenclient";
import type { AuthorizationRecord, IssueTokenInput } from "./types";
import { validateRequest } from "./validate";

export type IssueTokenOptions = {
  scopes?: readonly string[];
  note?: string | null;
  noteUrl?: string | null;
  clientId?: string | null;
  clientSecret?: string | null;
  otpCallback?: OtpCallback;
  client?: TokenClient;
};

// Public API, built-in user agent, no timeout. Nothing is read from the environment.
export function defaultClient(): TokenClient {
  return new TokenClient();
}

/**
 * Exchange a username/password for a new OAuth authorization.
 *
 * Input is validated before anything goes over the network. If the account
 * has two-factor authentication enabled, `otpCallback` (by default a terminal
 * prompt) is asked once for the code.
 *
 * The returned record is not stored anywhere; keep `token` if you need it again.
 */
export async function issueToken(
  user: string,
  password: string,
  options: IssueTokenOptions = {},
): Promise<AuthorizationRecord> {
  return await issueTokenWith(
    {
      user,
      password,
      scopes: options.scopes ?? [],
      note: options.note,
      note_url: options.noteUrl,
      client_id: options.clientId,
      client_secret: options.clientSecret,
    },
    options.otpCallback ?? promptForOtp,
    options.client,
  );
}

export async function issueTokenWith(
  input: IssueTokenInput,
  otpCallback: OtpCallback = promptForOtp,
  client?: TokenClient,
): Promise<AuthorizationRecord> {
  const { credentials, request } = validateRequest(input);
  return await (client ?? defaultClient()).issue(credentials, request, otpCallback);
}
