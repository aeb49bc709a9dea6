import { execFile } from "child_process";
import { promisify } from "util";
import { redactSecrets } from "./redact.js";

const execGit = promisify(execFile);

export type GitRunOptions = {
  cwd?: string;
  env?: Record<string, string>;
  signal?: AbortSignal;
  timeoutMs?: number;
};

export type GitOutput = { stdout: string; stderr: string };

// Allow tests to override how git is executed without relying on spy semantics on ESM exports
type RunGitImpl = (args: string[], options: GitRunOptions) => Promise<GitOutput>;
let runGitImpl: RunGitImpl | null = null;

export class GitCommandError extends Error {
  readonly stderr: string;
  readonly exitCode: number | null;
  readonly aborted: boolean;
  readonly timedOut: boolean;

  constructor(
    readonly args: string[],
    details: { stderr?: string; exitCode?: number | null; aborted?: boolean; timedOut?: boolean; message?: string },
  ) {
    const stderr = redactSecrets((details.stderr || "").trim());
    const summary = stderr || redactSecrets(details.message || "git failed");
    super(`git ${redactSecrets(args.join(" "))} failed: ${summary}`);
    this.name = "GitCommandError";
    this.stderr = stderr;
    this.exitCode = details.exitCode ?? null;
    this.aborted = details.aborted ?? false;
    this.timedOut = details.timedOut ?? false;
  }
}

export function gitEnv(extra: Record<string, string> = {}): Record<string, string | undefined> {
  return {
    ...process.env,
    GIT_TERMINAL_PROMPT: "0",
    GIT_ASKPASS: "",
    SSH_ASKPASS: "",
    LC_ALL: "C",
    ...extra,
  };
}

function field(error: unknown, key: string): unknown {
  if (error && typeof error === "object") return Reflect.get(error, key);
  return undefined;
}

function toGitCommandError(args: string[], error: unknown, signal?: AbortSignal): GitCommandError {
  if (error instanceof GitCommandError) return error;
  const name = field(error, "name");
  const code = field(error, "code");
  const stderr = field(error, "stderr");
  const killed = field(error, "killed") === true;
  const aborted = name === "AbortError" || code === "ABORT_ERR" || signal?.aborted === true;
  return new GitCommandError(args, {
    stderr: typeof stderr === "string" ? stderr : "",
    exitCode: typeof code === "number" ? code : null,
    aborted,
    timedOut: killed && !aborted,
    message: error instanceof Error ? error.message : String(error),
  });
}

export async function runGit(args: string[], options: GitRunOptions = {}): Promise<GitOutput> {
  try {
    if (runGitImpl) return await runGitImpl(args, options);
    const { stdout, stderr } = await execGit("git", args, {
      cwd: options.cwd,
      env: gitEnv(options.env),
      signal: options.signal,
      timeout: options.timeoutMs,
      maxBuffer: 64 * 1024 * 1024,
      encoding: "utf8",
    });
    return { stdout, stderr };
  } catch (error) {
    throw toGitCommandError(args, error, options.signal);
  }
}

// Test-only hook to override git execution
export function __setRunGitImplForTests(impl?: RunGitImpl | null) {
  runGitImpl = impl || null;
}
