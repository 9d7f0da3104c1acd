import { Input } from "./prompt";
import type { OtpChallenge } from "./types";

/**
 * Strategy used by TokenClient to obtain a one-time password after the
 * provider answers with a two-factor challenge. Returning undefined (or a
 * blank string) aborts the exchange.
 */
export type OtpCallback = (
  challenge: OtpChallenge,
) => string | undefined | Promise<string | undefined>;

// Default: ask on the terminal.
export const promptForOtp: OtpCallback = async (challenge) => {
  const via = challenge.delivery ? ` (sent via ${challenge.delivery})` : "";
  const code = await Input.prompt({
    message: `Two-factor code${via}:`,
    validate: (v: string) => /^\s*[0-9]+\s*$/.test(v) || "Enter the numeric code",
  });
  return code?.trim() || undefined;
};

export function fixedOtp(code: string): OtpCallback {
  return () => code;
}

export const noOtp: OtpCallback = () => undefined;
