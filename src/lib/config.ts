import process from "node:process";

export const APP_NAME = "ghauth";
export const APP_VERSION = "0.1.0";
export const DEFAULT_API_BASE = "https://api.github.com";
export const DEFAULT_USER_AGENT = `${APP_NAME}/${APP_VERSION}`;

const ENV_PREFIX = APP_NAME.toUpperCase();
const DEFAULT_TIMEOUT_MS = 30_000;

export type CliConfig = {
  apiBase: string;
  userAgent: string;
  // 0 => no timeout
  requestTimeoutMs: number;
  user: string;
  password: string;
};

function envInt(raw: string | undefined, fallback: number): number {
  if (raw == null || raw.trim() === "") return fallback;
  const n = Number(raw);
  return Number.isInteger(n) && n >= 0 ? n : fallback;
}

/**
 * Settings for the command-line tool. The library never calls this: a
 * TokenClient only knows what its constructor is given.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  return {
    apiBase: env[`${ENV_PREFIX}_API_URL`] || DEFAULT_API_BASE,
    userAgent: DEFAULT_USER_AGENT,
    requestTimeoutMs: envInt(env[`${ENV_PREFIX}_TIMEOUT_MS`], DEFAULT_TIMEOUT_MS),
    user: env[`${ENV_PREFIX}_USER`] ?? "",
    password: env[`${ENV_PREFIX}_PASSWORD`] ?? "",
  };
}
