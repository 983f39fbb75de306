export type KeywardError =
  | KeywardValidationError
  | KeywardUnauthenticatedError
  | KeywardExpiredError
  | KeywardRevokedError
  | KeywardInvalidSignatureError
  | KeywardDeniedError
  | KeywardConflictError
  | KeywardNotFoundError;

export type KeywardErrorKind = KeywardError["kind"];

export type KeywardValidationError = { kind: "validation-error"; message: string };

export type KeywardUnauthenticatedError = { kind: "unauthenticated"; message: string };

export type KeywardExpiredError = { kind: "expired"; message: string };

export type KeywardRevokedError = { kind: "revoked"; message: string };

export type KeywardInvalidSignatureError = {
  kind: "invalid-signature";
  message: string;
};

export type KeywardDeniedError = { kind: "denied"; reason: string; message: string };

export type KeywardConflictError = {
  kind: "conflict";
  message: string;
  /** Name of the violated unique constraint, when storage reports one */
  constraint?: string;
};

export type KeywardNotFoundError = { kind: "not-found"; message: string };

// Everything a credential check can fail with. The HTTP boundary collapses all
// of these into one generic 401.
export type AuthenticationFailure =
  | KeywardUnauthenticatedError
  | KeywardExpiredError
  | KeywardRevokedError
  | KeywardInvalidSignatureError;

const ERROR_KINDS: ReadonlySet<string> = new Set<KeywardErrorKind>([
  "validation-error",
  "unauthenticated",
  "expired",
  "revoked",
  "invalid-signature",
  "denied",
  "conflict",
  "not-found",
]);

const AUTHENTICATION_FAILURE_KINDS: ReadonlySet<string> = new Set<
  AuthenticationFailure["kind"]
>(["unauthenticated", "expired", "revoked", "invalid-signature"]);

const hasKind = (a: unknown): a is { kind: unknown } =>
  typeof a == "object" && a != null && "kind" in a;

export const isKeywardError = (a: unknown): a is KeywardError =>
  hasKind(a) && typeof a.kind == "string" && ERROR_KINDS.has(a.kind);

export const isValidationError = (a: unknown): a is KeywardValidationError =>
  hasKind(a) && a.kind == "validation-error";

export const isAuthenticationFailure = (
  a: unknown,
): a is AuthenticationFailure =>
  hasKind(a) &&
  typeof a.kind == "string" &&
  AUTHENTICATION_FAILURE_KINDS.has(a.kind);

export const validationError = (message: string): KeywardValidationError => ({
  kind: "validation-error",
  message,
});

export const unauthenticated = (
  message = "Invalid credentials",
): KeywardUnauthenticatedError => ({ kind: "unauthenticated", message });

export const expired = (message: string): KeywardExpiredError => ({
  kind: "expired",
  message,
});

export const revoked = (message: string): KeywardRevokedError => ({
  kind: "revoked",
  message,
});

export const invalidSignature = (
  message: string,
): KeywardInvalidSignatureError => ({ kind: "invalid-signature", message });

export const denied = (reason: string): KeywardDeniedError => ({
  kind: "denied",
  reason,
  message: `Forbidden: ${reason}`,
});

export const conflict = (
  message: string,
  constraint?: string,
): KeywardConflictError =>
  constraint === undefined
    ? { kind: "conflict", message }
    : { kind: "conflict", message, constraint };

export const notFound = (message: string): KeywardNotFoundError => ({
  kind: "not-found",
  message,
});
