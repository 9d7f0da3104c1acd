import { Buffer } from "node:buffer";
import type { Credentials } from "./types";

export function buildBasicAuth(user: string, password: string): string {
  const b64 = Buffer.from(`${user}:${password}`, "utf8").toString("base64");
  return `Basic ${b64}`;
}

// Inverse of buildBasicAuth. Returns null for anything that is not a Basic header.
export function parseBasicAuth(header: string): Credentials | null {
  const match = /^Basic ([A-Za-z0-9+/]+={0,2})$/.exec(header.trim());
  if (!match) return null;

  const decoded = Buffer.from(match[1], "base64").toString("utf8");
  const sep = decoded.indexOf(":");
  if (sep < 0) return null;

  return { user: decoded.slice(0, sep), password: decoded.slice(sep + 1) };
}
