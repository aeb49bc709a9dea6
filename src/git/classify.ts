import {
  AbortedError,
  AuthError,
  CorruptWorkspaceError,
  NetworkError,
  OrchestratorError,
  errorMessage,
} from "../errors.js";
import { GitCommandError } from "./core.js";
import { redactSecrets } from "./redact.js";

const AUTH_PATTERNS = [
  "authentication failed",
  "could not read username",
  "could not read password",
  "invalid username or password",
  "permission denied (publickey",
  "permission to",
  "access denied",
  "the requested url returned error: 401",
  "the requested url returned error: 403",
  "repository not found",
  "host key verification failed",
  "terminal prompts disabled",
];

const CORRUPT_PATTERNS = [
  "not a git repository",
  "bad object",
  "bad revision",
  "unknown revision",
  "corrupt",
  "unable to read",
  "loose object",
  "index file smaller than expected",
  "invalid object",
  "your local changes",
  "would be overwritten",
  "needed a single revision",
];

function matchesAny(text: string, patterns: string[]): boolean {
  const lower = text.toLowerCase();
  return patterns.some((pattern) => lower.includes(pattern));
}

/**
 * Maps a failed git invocation onto the orchestrator error taxonomy.
 * Failures that are neither auth nor workspace problems count as transient
 * network failures and go back through the retry budget.
 */
export function classifyGitFailure(error: unknown): OrchestratorError {
  if (error instanceof OrchestratorError) return error;

  const message = redactSecrets(errorMessage(error));
  if (error instanceof GitCommandError) {
    if (error.aborted) return new AbortedError("git operation aborted", { cause: error });
    if (error.timedOut) return new NetworkError(`git operation timed out: ${message}`, { cause: error });
  }

  const text = error instanceof GitCommandError ? `${error.stderr}\n${message}` : message;
  if (matchesAny(text, AUTH_PATTERNS)) return new AuthError(message, { cause: error });
  if (matchesAny(text, CORRUPT_PATTERNS)) return new CorruptWorkspaceError(message, { cause: error });
  return new NetworkError(message, { cause: error });
}
