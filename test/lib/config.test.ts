import { describe, expect, it } from "vitest";
import { DEFAULT_API_BASE, DEFAULT_USER_AGENT, loadConfig } from "../../src/lib/config";

describe("loadConfig", () => {
  it("falls back to the defaults on an empty environment", () => {
    expect(loadConfig({})).toEqual({
      apiBase: DEFAULT_API_BASE,
      userAgent: DEFAULT_USER_AGENT,
      requestTimeoutMs: 30_000,
      user: "",
      password: "",
    });
  });

  it("reads the GHAUTH_ variables", () => {
    const cfg = loadConfig({
      GHAUTH_API_URL: "https://ghe.example.com/api/v3",
      GHAUTH_TIMEOUT_MS: "0",
      GHAUTH_USER: "alice",
      GHAUTH_PASSWORD: "test-secret",
    });
    expect(cfg.apiBase).toBe("https://ghe.example.com/api/v3");
    expect(cfg.requestTimeoutMs).toBe(0);
    expect(cfg.user).toBe("alice");
    expect(cfg.password).toBe("test-secret");
  });

  it("ignores a timeout that is not a whole number", () => {
    expect(loadConfig({ GHAUTH_TIMEOUT_MS: "soon" }).requestTimeoutMs).toBe(30_000);
    expect(loadConfig({ GHAUTH_TIMEOUT_MS: "-5" }).requestTimeoutMs).toBe(30_000);
  });
});
