import { NoUsableCredentialError, type CredentialAttempt } from "../errors.js";
import { logger } from "../logger.js";
import { repoKey, type RepositoryRef } from "../repos/RepositoryRef.js";
import {
  DEFAULT_CREDENTIAL_PREFERENCE,
  createCredentialHandle,
  isExpired,
  type CredentialHandle,
  type CredentialMethod,
} from "./CredentialHandle.js";
import type { SecretStore } from "./SecretStore.js";

export interface ResolveOptions {
  /** Tags already rejected during this pass. */
  exclude?: readonly CredentialMethod[];
}

export class CredentialResolver {
  private readonly now: () => Date;

  constructor(private readonly store: SecretStore, options: { now?: () => Date } = {}) {
    this.now = options.now ?? (() => new Date());
  }

  async resolve(
    repo: RepositoryRef,
    candidates: readonly CredentialMethod[] = DEFAULT_CREDENTIAL_PREFERENCE,
    options: ResolveOptions = {},
  ): Promise<CredentialHandle> {
    const excluded = new Set(options.exclude ?? []);
    const seen = new Set<CredentialMethod>();
    const tried: CredentialAttempt[] = [];

    for (const tag of candidates) {
      if (seen.has(tag)) continue;
      seen.add(tag);

      if (excluded.has(tag)) {
        tried.push({ tag, reason: "excluded" });
        continue;
      }

      const record = await this.store.get(tag, repo);
      if (!record || !record.secret) {
        tried.push({ tag, reason: "not-found" });
        continue;
      }
      if (isExpired(record.expiresAt, this.now())) {
        tried.push({ tag, reason: "expired" });
        logger.debug("credential expired, trying next", {
          repository: repoKey(repo),
          tag,
          expiresAt: record.expiresAt,
        });
        continue;
      }

      const handle = createCredentialHandle(tag, record.secret, {
        expiresAt: record.expiresAt ?? null,
        scope: record.scope,
        username: record.username,
      });
      logger.debug("credential resolved", { repository: repoKey(repo), credential: handle.toJSON() });
      return handle;
    }

    throw new NoUsableCredentialError(repoKey(repo), tried);
  }
}
