export type ErrorKind =
  | "NoUsableCredential"
  | "AuthError"
  | "NetworkError"
  | "CorruptWorkspace"
  | "DivergedHistory"
  | "Aborted";

export abstract class OrchestratorError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type CredentialSkipReason = "not-found" | "expired" | "excluded";

export interface CredentialAttempt {
  tag: string;
  reason: CredentialSkipReason;
}

export class NoUsableCredentialError extends OrchestratorError {
  readonly kind = "NoUsableCredential" as const;
  readonly retryable = false;

  constructor(readonly repository: string, readonly tried: CredentialAttempt[]) {
    super(
      tried.length
        ? `No usable credential for ${repository} (tried ${tried.map((t) => `${t.tag}:${t.reason}`).join(", ")})`
        : `No usable credential for ${repository} (no candidates)`,
    );
  }
}

export class AuthError extends OrchestratorError {
  readonly kind = "AuthError" as const;
  readonly retryable = true;
}

export class NetworkError extends OrchestratorError {
  readonly kind = "NetworkError" as const;
  readonly retryable = true;
}

export class CorruptWorkspaceError extends OrchestratorError {
  readonly kind = "CorruptWorkspace" as const;
  readonly retryable = false;
}

export class DivergedHistoryError extends OrchestratorError {
  readonly kind = "DivergedHistory" as const;
  readonly retryable = false;
}

export class AbortedError extends OrchestratorError {
  readonly kind = "Aborted" as const;
  readonly retryable = false;
}

export function isOrchestratorError(error: unknown): error is OrchestratorError {
  return error instanceof OrchestratorError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
