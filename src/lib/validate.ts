import { ValidationError } from "./errors";
import { isLegalScope } from "./scopes";
import type { AuthorizationRequest, Credentials, IssueTokenInput } from "./types";

const USER_RE = /^[A-Za-z0-9.@]+$/;
const CLIENT_ID_RE = /^[a-f0-9]{20}$/;
const CLIENT_SECRET_RE = /^[a-f0-9]{40}$/;

// Empty strings count as "not given" for the optional fields.
function present(v: string | null | undefined): v is string {
  return v != null && v !== "";
}

/**
 * Collects every problem with the caller's input.
 * An empty result means the input is usable as-is.
 */
export function findViolations(input: IssueTokenInput): string[] {
  const violations: string[] = [];
  const { user, password, client_id, client_secret } = input;

  if (!present(user)) {
    violations.push("user not supplied");
  } else if (!USER_RE.test(user)) {
    violations.push(`illegal_user: ${user}`);
  }

  if (!present(password)) {
    violations.push("password not supplied");
  }

  for (const scope of input.scopes ?? []) {
    if (!isLegalScope(scope)) violations.push(`illegal_scope: ${scope}`);
  }

  if (present(client_id) && !CLIENT_ID_RE.test(client_id)) {
    violations.push(`illegal_client_id: ${client_id}`);
  }
  // never echo the secret
  if (present(client_secret) && !CLIENT_SECRET_RE.test(client_secret)) {
    violations.push("illegal_client_secret");
  }
  if (present(client_id) !== present(client_secret)) {
    violations.push("client_id and client_secret must be supplied together");
  }

  return violations;
}

export function validateRequest(
  input: IssueTokenInput,
): { credentials: Credentials; request: AuthorizationRequest } {
  const violations = findViolations(input);
  if (violations.length || !present(input.user) || !present(input.password)) {
    throw new ValidationError(violations);
  }

  const request: AuthorizationRequest = { scopes: [...(input.scopes ?? [])] };
  if (present(input.note)) request.note = input.note;
  if (present(input.note_url)) request.note_url = input.note_url;
  if (present(input.client_id) && present(input.client_secret)) {
    request.client_id = input.client_id;
    request.client_secret = input.client_secret;
  }

  return {
    credentials: { user: input.user, password: input.password },
    request,
  };
}
