export { defaultClient, issueToken, issueTokenWith } from "./lib/api";
export type { IssueTokenOptions } from "./lib/api";
export { buildBasicAuth, parseBasicAuth } from "./lib/basic-auth";
export {
  GhAuthError,
  OtpAcquisitionError,
  RemoteAuthorizationError,
  TransportError,
  ValidationError,
} from "./lib/errors";
export { fixedOtp, noOtp, promptForOtp } from "./lib/otp";
export type { OtpCallback } from "./lib/otp";
export { describeScope, isLegalScope, legalScopes } from "./lib/scopes";
export { OTP_HEADER, TokenClient } from "./lib/tokenclient";
export type { TokenClientOptions } from "./lib/tokenclient";
export type {
  AuthorizationApp,
  AuthorizationRecord,
  AuthorizationRequest,
  Credentials,
  IssueTokenInput,
  OtpChallenge,
} from "./lib/types";
export { findViolations, validateRequest } from "./lib/validate";
