import { randomBytes } from "crypto";
import fs from "fs/promises";
import path from "path";
import { AbortedError, CorruptWorkspaceError, DivergedHistoryError } from "../errors.js";
import { withGitAuth } from "../git/auth.js";
import { classifyGitFailure } from "../git/classify.js";
import { runGit } from "../git/core.js";
import {
  changedPathsBetween,
  commitExists,
  detectRemoteDefaultBranch,
  isAncestor,
  isValidCheckout,
  listTrackedFiles,
  revParse,
} from "../git/queries.js";
import { logger } from "../logger.js";
import {
  repoKey,
  workspaceDirName,
  workspacePathFor,
  type RepositoryRef,
} from "../repos/RepositoryRef.js";
import { directoryExists, removeDirectory } from "../util/fsUtils.js";
import { defaultRemoteUrl } from "./remote.js";
import type {
  RemoteUrlResolver,
  SyncMode,
  SyncRequest,
  SyncResult,
  Syncer,
  Watermark,
} from "./types.js";

export const STAGING_DIR = ".staging";

export interface SyncEngineOptions {
  workspaceRoot: string;
  timeoutMs?: number;
  remoteUrlFor?: RemoteUrlResolver;
  now?: () => Date;
}

function throwIfAborted(signal: AbortSignal | undefined, stage: string) {
  if (signal?.aborted) throw new AbortedError(`sync aborted ${stage}`);
}

export class SyncEngine implements Syncer {
  readonly workspaceRoot: string;
  private readonly timeoutMs?: number;
  private readonly remoteFor: RemoteUrlResolver;
  private readonly now: () => Date;

  constructor(options: SyncEngineOptions) {
    this.workspaceRoot = path.resolve(options.workspaceRoot);
    this.timeoutMs = options.timeoutMs;
    this.remoteFor = options.remoteUrlFor ?? defaultRemoteUrl;
    this.now = options.now ?? (() => new Date());
  }

  workspacePath(repo: RepositoryRef): string {
    return workspacePathFor(this.workspaceRoot, repo);
  }

  async sync(request: SyncRequest): Promise<SyncResult> {
    const started = Date.now();
    const { repo, previousWatermark } = request;
    const dir = this.workspacePath(repo);

    try {
      throwIfAborted(request.signal, "before start");

      if (request.forceFull) {
        return await this.fullClone(request, dir, "forced", started);
      }
      if (!previousWatermark || !(await directoryExists(dir))) {
        return await this.fullClone(request, dir, "initial", started);
      }
      if (!(await isValidCheckout(dir))) {
        throw new CorruptWorkspaceError(`workspace for ${repoKey(repo)} has no usable git metadata`);
      }
      if (!(await commitExists(dir, previousWatermark.commit))) {
        throw new CorruptWorkspaceError(
          `workspace for ${repoKey(repo)} is missing watermark commit ${previousWatermark.commit}`,
        );
      }
      try {
        return await this.incremental(request, previousWatermark, dir, started);
      } catch (e) {
        if (!(e instanceof DivergedHistoryError)) throw e;
        logger.info("history diverged, escalating to full re-clone", { repository: repoKey(repo), reason: e.message });
        return await this.fullClone(request, dir, "diverged", started);
      }
    } catch (e) {
      throw classifyGitFailure(e);
    }
  }

  /** Removes staging directories left behind by an interrupted process. */
  async cleanupStaging(): Promise<void> {
    await removeDirectory(path.join(this.workspaceRoot, STAGING_DIR));
  }

  private watermark(commit: string): Watermark {
    return { commit, syncedAt: this.now().toISOString() };
  }

  private async fetch(request: SyncRequest, dir: string) {
    const remote = this.remoteFor(request.repo, request.credential);
    await withGitAuth(request.credential, request.repo, (env) =>
      runGit(
        ["fetch", "--prune", "--no-tags", "--quiet", remote, "+refs/heads/*:refs/remotes/origin/*"],
        { cwd: dir, env, signal: request.signal, timeoutMs: this.timeoutMs },
      ),
    );
  }

  private async incremental(
    request: SyncRequest,
    previous: Watermark,
    dir: string,
    started: number,
  ): Promise<SyncResult> {
    const head = await revParse(dir, "HEAD");
    if (head !== previous.commit) {
      throw new CorruptWorkspaceError(
        `workspace HEAD ${head} does not match watermark ${previous.commit} for ${repoKey(request.repo)}`,
      );
    }

    await this.fetch(request, dir);

    const branch = await detectRemoteDefaultBranch(dir);
    if (!branch) {
      throw new CorruptWorkspaceError(`cannot determine default branch in workspace for ${repoKey(request.repo)}`);
    }
    const tip = await revParse(dir, `refs/remotes/origin/${branch}`);

    if (tip === previous.commit) {
      logger.debug("sync no-op", { repository: repoKey(request.repo), commit: tip });
      return {
        before: previous,
        after: previous,
        changedPaths: [],
        full: false,
        mode: "noop",
        durationMs: Date.now() - started,
      };
    }

    if (!(await isAncestor(dir, previous.commit, tip))) {
      throw new DivergedHistoryError(`remote tip ${tip} does not descend from watermark ${previous.commit}`);
    }

    const changedPaths = await changedPathsBetween(dir, previous.commit, tip);
    throwIfAborted(request.signal, "before fast-forward");
    // the fast-forward is short and local; once started it runs to completion
    await runGit(["merge", "--ff-only", "--quiet", tip], { cwd: dir, timeoutMs: this.timeoutMs });

    logger.info("sync fast-forwarded", {
      repository: repoKey(request.repo),
      from: previous.commit,
      to: tip,
      changed: changedPaths.length,
    });
    return {
      before: previous,
      after: this.watermark(tip),
      changedPaths,
      full: false,
      mode: "incremental",
      durationMs: Date.now() - started,
    };
  }

  /**
   * Clones into a private staging directory and swaps it into place only
   * once the clone is complete, so an aborted or failed clone leaves the
   * previous workspace (or no workspace) exactly as it was.
   */
  private async fullClone(
    request: SyncRequest,
    dir: string,
    mode: SyncMode,
    started: number,
  ): Promise<SyncResult> {
    const stagingRoot = path.join(this.workspaceRoot, STAGING_DIR);
    await fs.mkdir(stagingRoot, { recursive: true });
    const staging = await fs.mkdtemp(path.join(stagingRoot, `${workspaceDirName(request.repo)}-`));
    const remote = this.remoteFor(request.repo, request.credential);

    try {
      logger.info("git clone", { repository: repoKey(request.repo), mode, credential: request.credential.toJSON() });
      await withGitAuth(request.credential, request.repo, (env) =>
        runGit(["clone", "--single-branch", "--no-tags", "--quiet", remote, staging], {
          cwd: stagingRoot,
          env,
          signal: request.signal,
          timeoutMs: this.timeoutMs,
        }),
      );
      throwIfAborted(request.signal, "after clone");

      const commit = await revParse(staging, "HEAD");
      const changedPaths = await listTrackedFiles(staging);
      await this.swapIntoPlace(staging, dir);

      return {
        before: request.previousWatermark,
        after: this.watermark(commit),
        changedPaths,
        full: true,
        mode,
        durationMs: Date.now() - started,
      };
    } catch (e) {
      await removeDirectory(staging);
      throw e;
    }
  }

  private async swapIntoPlace(staging: string, dir: string) {
    await fs.mkdir(path.dirname(dir), { recursive: true });
    if (!(await pathExists(dir))) {
      await fs.rename(staging, dir);
      return;
    }
    const retired = `${staging}-retired-${randomBytes(4).toString("hex")}`;
    await fs.rename(dir, retired);
    try {
      await fs.rename(staging, dir);
    } catch (e) {
      await fs.rename(retired, dir);
      throw e;
    }
    await removeDirectory(retired);
  }
}

async function pathExists(p: string) {
  try {
    await fs.lstat(p);
    return true;
  } catch {
    return false;
  }
}
