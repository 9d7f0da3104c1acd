export class GhAuthError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);

    this.name = new.target.name;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  override toString(): string {
    return this.message ? `${this.name}: ${this.message}` : this.name;
  }
}

export class ValidationError extends GhAuthError {
  violations: string[];

  constructor(violations: string[]) {
    super(`Bad options: ${violations.join(" ")}`);
    this.violations = violations;
  }
}

export class OtpAcquisitionError extends GhAuthError {
  constructor(message = "could not acquire OTP from user") {
    super(message);
  }
}

export class RemoteAuthorizationError extends GhAuthError {
  status: number;
  reason: string;

  constructor(status: number, reason: string, message: string) {
    super(message);
    this.status = status;
    this.reason = reason;
  }

  override toString(): string {
    return `Failed: ${this.status}/${this.reason} / ${this.message}`;
  }
}

export class TransportError extends GhAuthError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }

  override toString(): string {
    const parts = [super.toString()];
    if (this.cause instanceof Error && this.cause.message) {
      parts.push(this.cause.message);
    }
    return parts.join(" : ");
  }
}
