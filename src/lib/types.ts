export type Credentials = {
  user: string;
  password: string;
};

// Flat caller input, using the wire names of the authorization API.
export type IssueTokenInput = {
  user?: string;
  password?: string;
  scopes?: readonly string[];
  note?: string | null;
  note_url?: string | null;
  client_id?: string | null;
  client_secret?: string | null;
};

export type AuthorizationRequest = {
  scopes: string[];
  note?: string;
  note_url?: string;
  client_id?: string;
  client_secret?: string;
};

export type AuthorizationApp = {
  name: string;
  url: string;
  client_id?: string;
};

export type AuthorizationRecord = {
  id: number;
  token: string;
  note: string | null;
  note_url: string | null;
  scopes: string[];
  app: AuthorizationApp;
  created_at: string;
  updated_at: string;
  url: string;
};

export type OtpChallenge = {
  status: number;
  reason: string;
  delivery?: string; // "app", "sms", ...
};
