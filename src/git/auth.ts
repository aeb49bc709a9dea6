import fs from "fs/promises";
import os from "os";
import path from "path";
import {
  revealSecret,
  type CredentialHandle,
} from "../credentials/CredentialHandle.js";
import type { RepositoryRef } from "../repos/RepositoryRef.js";

/**
 * Environment for one git child process. Token credentials become a
 * host-scoped `http.extraHeader` passed through GIT_CONFIG_* variables, so
 * they never appear in argv, in the remote URL or in `.git/config`.
 */
export type GitAuthEnv = Record<string, string>;

function tokenEnv(handle: CredentialHandle, repo: RepositoryRef): GitAuthEnv {
  const { secret, username } = revealSecret(handle);
  const user = username || "x-access-token";
  const basic = Buffer.from(`${user}:${secret.trim()}`, "utf8").toString("base64");
  return {
    GIT_CONFIG_COUNT: "1",
    GIT_CONFIG_KEY_0: `http.https://${repo.host}/.extraHeader`,
    GIT_CONFIG_VALUE_0: `Authorization: Basic ${basic}`,
  };
}

async function writeKeyFile(handle: CredentialHandle): Promise<{ dir: string; keyPath: string }> {
  const { secret } = revealSecret(handle);
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "repo-sync-key-"));
  const keyPath = path.join(dir, "id_deploy");
  const body = secret.endsWith("\n") ? secret : `${secret}\n`;
  await fs.writeFile(keyPath, body, { mode: 0o600 });
  return { dir, keyPath };
}

export async function withGitAuth<T>(
  handle: CredentialHandle,
  repo: RepositoryRef,
  fn: (env: GitAuthEnv) => Promise<T>,
): Promise<T> {
  if (handle.tag !== "deploy-key") {
    return fn(tokenEnv(handle, repo));
  }

  const { dir, keyPath } = await writeKeyFile(handle);
  try {
    return await fn({
      GIT_SSH_COMMAND: `ssh -i "${keyPath}" -o IdentitiesOnly=yes -o BatchMode=yes -o StrictHostKeyChecking=accept-new`,
    });
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}
