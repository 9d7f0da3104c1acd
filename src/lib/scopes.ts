// Legal scopes for the authorizations API. Requesting no scope at all is also
// legal and grants public read-only access.
const SCOPES: Readonly<Record<string, string>> = Object.freeze({
  "user": "Read/write access to profile info only.",
  "user:email": "Read access to a user's email addresses.",
  "user:follow": "Access to follow or unfollow other users.",
  "public_repo": "Read/write access to public repos and organizations.",
  "repo": "Read/write access to public and private repos and organizations.",
  "repo:status": "Read/write access to public and private repo statuses. Does not include access to code.",
  "delete_repo": "Delete access to adminable repositories.",
  "notifications": "Read access to a user's notifications.",
  "gist": "Write access to gists.",
});

export function isLegalScope(name: string): boolean {
  return Object.prototype.hasOwnProperty.call(SCOPES, name);
}

export function legalScopes(): string[] {
  return Object.keys(SCOPES).sort();
}

export function describeScope(name: string): string | undefined {
  return isLegalScope(name) ? SCOPES[name] : undefined;
}
