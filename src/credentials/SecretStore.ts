import fs from "fs/promises";
import type { Config } from "../config.js";
import { logger } from "../logger.js";
import { repoKey, type RepositoryRef } from "../repos/RepositoryRef.js";
import type { CredentialMethod, CredentialScope } from "./CredentialHandle.js";

export interface SecretRecord {
  secret: string;
  expiresAt?: Date | null;
  scope?: CredentialScope;
  username?: string;
}

export interface SecretStore {
  /** Resolves to null when nothing is stored for the tag (NotFound). */
  get(tag: CredentialMethod, repo: RepositoryRef): Promise<SecretRecord | null>;
}

export class MemorySecretStore implements SecretStore {
  private readonly global = new Map<CredentialMethod, SecretRecord>();
  private readonly scoped = new Map<string, SecretRecord>();

  set(tag: CredentialMethod, record: SecretRecord, repo?: RepositoryRef): this {
    if (repo) this.scoped.set(`${tag}@${repoKey(repo)}`, { ...record });
    else this.global.set(tag, { ...record });
    return this;
  }

  delete(tag: CredentialMethod, repo?: RepositoryRef): boolean {
    if (repo) return this.scoped.delete(`${tag}@${repoKey(repo)}`);
    return this.global.delete(tag);
  }

  async get(tag: CredentialMethod, repo: RepositoryRef): Promise<SecretRecord | null> {
    const record = this.scoped.get(`${tag}@${repoKey(repo)}`) ?? this.global.get(tag);
    return record ? { ...record } : null;
  }
}

/**
 * Secrets supplied through the environment. Tokens are held in memory; the
 * deploy key is read from `GIT_SSH_KEY_PATH` on every lookup so a rotated key
 * file takes effect without a restart.
 */
export class EnvSecretStore implements SecretStore {
  private readonly tokens = new MemorySecretStore();

  constructor(private readonly credentials: Config["credentials"]) {
    const scope: CredentialScope = credentials.writeAccess ? "write" : "read";
    const username = credentials.username || undefined;
    const entries: Array<[CredentialMethod, { secret: string; expiresAt: Date | null }]> = [
      ["pat", credentials.pat],
      ["fine-grained-pat", credentials.fineGrainedPat],
      ["collaborator-token", credentials.collaboratorToken],
      ["github-app-installation", credentials.appInstallationToken],
    ];
    for (const [tag, value] of entries) {
      if (!value.secret) continue;
      this.tokens.set(tag, { secret: value.secret, expiresAt: value.expiresAt, scope, username });
    }
  }

  async get(tag: CredentialMethod, repo: RepositoryRef): Promise<SecretRecord | null> {
    if (tag !== "deploy-key") return this.tokens.get(tag, repo);
    const keyPath = this.credentials.sshKeyPath;
    if (!keyPath) return null;
    try {
      const secret = await fs.readFile(keyPath, "utf8");
      return { secret, expiresAt: this.credentials.sshKeyExpiresAt, scope: "read" };
    } catch (e) {
      const code = e instanceof Error && "code" in e ? e.code : undefined;
      if (code === "ENOENT") {
        logger.warn("deploy key file missing", { path: keyPath });
        return null;
      }
      throw e;
    }
  }
}
