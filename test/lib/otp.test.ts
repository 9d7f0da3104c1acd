import prompts from "prompts";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { fixedOtp, noOtp, promptForOtp } from "../../src/lib/otp";

vi.mock("prompts", () => ({ default: vi.fn() }));

const promptsMock = vi.mocked(prompts);

beforeEach(() => {
  promptsMock.mockReset();
});

describe("promptForOtp", () => {
  it("asks for the code and names the delivery method", async () => {
    promptsMock.mockResolvedValueOnce({ value: " 123456 " });

    const code = await promptForOtp({ status: 401, reason: "Unauthorized", delivery: "sms" });

    expect(code).toBe("123456");
    expect(promptsMock).toHaveBeenCalledTimes(1);
    expect(promptsMock.mock.calls[0][0]).toMatchObject({
      type: "text",
      name: "value",
      message: "Two-factor code (sent via sms):",
    });
  });

  it("omits the delivery method when unknown", async () => {
    promptsMock.mockResolvedValueOnce({ value: "42" });
    await promptForOtp({ status: 401, reason: "Unauthorized" });
    expect(promptsMock.mock.calls[0][0]).toMatchObject({ message: "Two-factor code:" });
  });

  it("returns undefined when the prompt is cancelled", async () => {
    promptsMock.mockResolvedValueOnce({});
    expect(await promptForOtp({ status: 401, reason: "Unauthorized" })).toBeUndefined();
  });

  it("returns undefined for an empty answer", async () => {
    promptsMock.mockResolvedValueOnce({ value: "" });
    expect(await promptForOtp({ status: 401, reason: "Unauthorized" })).toBeUndefined();
  });
});

describe("fixed strategies", () => {
  const challenge = { status: 401, reason: "Unauthorized", delivery: "app" };

  it("fixedOtp always answers with its code", () => {
    const otp = fixedOtp("000111");
    expect(otp(challenge)).toBe("000111");
    expect(otp(challenge)).toBe("000111");
  });

  it("noOtp always declines", () => {
    expect(noOtp(challenge)).toBeUndefined();
  });
});
