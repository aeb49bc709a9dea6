import fs from "fs/promises";
import path from "path";
import { logger } from "../logger.js";
import { directoryExists } from "../util/fsUtils.js";
import { runGit, type GitRunOptions } from "./core.js";

export async function detectRemoteDefaultBranch(
  repoRoot: string,
): Promise<string | null> {
  try {
    const symbolic = await runGit(
      ["symbolic-ref", "--quiet", "refs/remotes/origin/HEAD"],
      { cwd: repoRoot },
    );
    const ref = symbolic.stdout.trim();
    if (ref.startsWith("refs/remotes/origin/")) {
      return ref.slice("refs/remotes/origin/".length);
    }
    if (ref.length) return ref;
  } catch (e) {
    logger.debug("Failed to detect remote default branch via symbolic-ref", {
      repoRoot,
      error: String(e),
    });
  }

  try {
    const current = await runGit(["symbolic-ref", "--quiet", "--short", "HEAD"], {
      cwd: repoRoot,
    });
    const branch = current.stdout.trim();
    if (branch) return branch;
  } catch (e) {
    logger.debug("Failed to read checked-out branch", {
      repoRoot,
      error: String(e),
    });
  }

  return null;
}

/**
 * A checkout is usable when it has a metadata directory git itself
 * recognises as the top level of this exact path and HEAD resolves.
 */
export async function isValidCheckout(repoRoot: string): Promise<boolean> {
  if (!(await directoryExists(path.join(repoRoot, ".git")))) return false;
  try {
    const top = await runGit(["rev-parse", "--show-toplevel"], { cwd: repoRoot });
    const [actual, expected] = await Promise.all([
      fs.realpath(top.stdout.trim()),
      fs.realpath(repoRoot),
    ]);
    if (actual !== expected) return false;
    await runGit(["rev-parse", "--verify", "HEAD^{commit}"], { cwd: repoRoot });
    return true;
  } catch (e) {
    logger.debug("checkout validation failed", { repoRoot, error: String(e) });
    return false;
  }
}

export async function revParse(repoRoot: string, rev: string): Promise<string> {
  const out = await runGit(["rev-parse", "--verify", `${rev}^{commit}`], { cwd: repoRoot });
  return out.stdout.trim();
}

export async function commitExists(repoRoot: string, commit: string): Promise<boolean> {
  try {
    await runGit(["cat-file", "-e", `${commit}^{commit}`], { cwd: repoRoot });
    return true;
  } catch {
    return false;
  }
}

export async function isAncestor(repoRoot: string, ancestor: string, descendant: string): Promise<boolean> {
  try {
    await runGit(["merge-base", "--is-ancestor", ancestor, descendant], { cwd: repoRoot });
    return true;
  } catch (e) {
    // exit status 1 is the "no" answer; anything else is a real failure
    if (e && typeof e === "object" && Reflect.get(e, "exitCode") === 1) return false;
    throw e;
  }
}

function splitNul(out: string): string[] {
  return out.split("\0").filter((p) => p.length > 0);
}

function sortedUnique(paths: string[]): string[] {
  return Array.from(new Set(paths)).sort();
}

export async function listTrackedFiles(repoRoot: string): Promise<string[]> {
  const out = await runGit(["ls-files", "-z"], { cwd: repoRoot });
  return sortedUnique(splitNul(out.stdout));
}

/**
 * Paths that differ between two commits, renames reported under both names
 * so downstream re-analysis sees the removal and the addition.
 */
export async function changedPathsBetween(repoRoot: string, from: string, to: string): Promise<string[]> {
  const out = await runGit(["diff", "--name-only", "--no-renames", "-z", from, to], { cwd: repoRoot });
  return sortedUnique(splitNul(out.stdout));
}

export async function lsRemoteHead(remote: string, options: GitRunOptions = {}): Promise<string | null> {
  const out = await runGit(["ls-remote", remote, "HEAD"], options);
  const line = out.stdout
    .split(/\r?\n/)
    .map((s) => s.trim())
    .find((s) => s.endsWith("\tHEAD") || s.endsWith(" HEAD"));
  if (!line) return null;
  const sha = line.split(/\s+/)[0];
  return /^[0-9a-f]{40,64}$/i.test(sha) ? sha.toLowerCase() : null;
}
