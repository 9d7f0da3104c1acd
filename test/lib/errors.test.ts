import { describe, expect, it } from "vitest";
import {
  GhAuthError,
  OtpAcquisitionError,
  RemoteAuthorizationError,
  TransportError,
  ValidationError,
} from "../../src/lib/errors";

describe("errors", () => {
  it("ValidationError keeps each violation and joins them in the message", () => {
    const err = new ValidationError(["user not supplied", "illegal_scope: x"]);
    expect(err).toBeInstanceOf(GhAuthError);
    expect(err.name).toBe("ValidationError");
    expect(err.violations).toEqual(["user not supplied", "illegal_scope: x"]);
    expect(err.message).toBe("Bad options: user not supplied illegal_scope: x");
    expect(err.toString()).toBe("ValidationError: Bad options: user not supplied illegal_scope: x");
  });

  it("OtpAcquisitionError has a default message", () => {
    const err = new OtpAcquisitionError();
    expect(err.name).toBe("OtpAcquisitionError");
    expect(err.message).toBe("could not acquire OTP from user");
  });

  it("RemoteAuthorizationError carries status, reason and message", () => {
    const err = new RemoteAuthorizationError(401, "Unauthorized", "Bad credentials");
    expect(err.status).toBe(401);
    expect(err.reason).toBe("Unauthorized");
    expect(err.message).toBe("Bad credentials");
    expect(err.toString()).toBe("Failed: 401/Unauthorized / Bad credentials");
  });

  it("TransportError keeps its cause", () => {
    const cause = new Error("connect ECONNREFUSED 127.0.0.1:443");
    const err = new TransportError("request failed", cause);
    expect(err.cause).toBe(cause);
    expect(err.toString()).toBe("TransportError: request failed : connect ECONNREFUSED 127.0.0.1:443");
  });

  it("TransportError without a cause prints only its message", () => {
    expect(new TransportError("timed out").toString()).toBe("TransportError: timed out");
  });
});
