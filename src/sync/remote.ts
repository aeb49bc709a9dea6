import {
  transportFor,
  type CredentialHandle,
  type CredentialMethod,
} from "../credentials/CredentialHandle.js";
import type { CredentialResolver } from "../credentials/CredentialResolver.js";
import { withGitAuth } from "../git/auth.js";
import { classifyGitFailure } from "../git/classify.js";
import { lsRemoteHead } from "../git/queries.js";
import { remoteUrlFor, type RepositoryRef } from "../repos/RepositoryRef.js";
import type { RemoteUrlResolver } from "./types.js";

export const defaultRemoteUrl: RemoteUrlResolver = (repo: RepositoryRef, credential: CredentialHandle) =>
  remoteUrlFor(repo, transportFor(credential.tag));

export interface RemoteTipQuery {
  /** Commit id of the remote default branch, or null for an empty remote. */
  tip(repo: RepositoryRef): Promise<string | null>;
}

/**
 * Lightweight `git ls-remote HEAD` against the remote; no objects are
 * transferred and the workspace is not touched.
 */
export class GitRemoteTipQuery implements RemoteTipQuery {
  private readonly remoteFor: RemoteUrlResolver;
  private readonly timeoutMs?: number;

  constructor(
    private readonly resolver: CredentialResolver,
    private readonly candidatesFor: (repo: RepositoryRef) => readonly CredentialMethod[],
    options: { remoteUrlFor?: RemoteUrlResolver; timeoutMs?: number } = {},
  ) {
    this.remoteFor = options.remoteUrlFor ?? defaultRemoteUrl;
    this.timeoutMs = options.timeoutMs;
  }

  async tip(repo: RepositoryRef): Promise<string | null> {
    const credential = await this.resolver.resolve(repo, this.candidatesFor(repo));
    const remote = this.remoteFor(repo, credential);
    try {
      return await withGitAuth(credential, repo, (env) =>
        lsRemoteHead(remote, { env, timeoutMs: this.timeoutMs }),
      );
    } catch (e) {
      throw classifyGitFailure(e);
    }
  }
}
