export type FetchErrorKind =
  | "unauthorized"
  | "rate-limited"
  | "server-error"
  | "network"
  | "parse-error";

export type FetchError =
  | { kind: "unauthorized" }
  | { kind: "rate-limited" }
  | { kind: "server-error"; status: number }
  | { kind: "network"; message: string }
  | { kind: "parse-error"; message: string };

export type ClassifiedError = {
  kind: FetchErrorKind;
  message: string;
  // false means retrying will not help until the user acts (re-auth).
  retryable: boolean;
};

export function classifyFetchError(err: FetchError): ClassifiedError {
  switch (err.kind) {
    case "unauthorized":
      return {
        kind: err.kind,
        message: "Session expired. Please update your session token in Settings.",
        retryable: false,
      };
    case "rate-limited":
      return {
        kind: err.kind,
        message: "Rate limited. Please wait a moment and try again.",
        retryable: true,
      };
    case "server-error":
      return {
        kind: err.kind,
        message: `Usage service error (HTTP ${err.status}). Will retry automatically.`,
        retryable: true,
      };
    case "network":
      return {
        kind: err.kind,
        message: "Network error. Check your internet connection.",
        retryable: true,
      };
    case "parse-error":
      return {
        kind: err.kind,
        message: "Unexpected response from the usage service.",
        retryable: true,
      };
  }
}

export function describeFetchError(err: FetchError): string {
  switch (err.kind) {
    case "server-error":
      return `${err.kind} (HTTP ${err.status})`;
    case "network":
    case "parse-error":
      return `${err.kind}: ${err.message}`;
    default:
      return err.kind;
  }
}

export type CredentialField = "organization_id" | "session_token";

export type ValidationError = {
  field: CredentialField;
  message: string;
};

export class CredentialValidationError extends Error {
  readonly field: CredentialField;

  constructor(error: ValidationError) {
    super(error.message);
    this.name = "CredentialValidationError";
    this.field = error.field;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
