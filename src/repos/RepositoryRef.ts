import path from "path";
import { sanitizeSegment } from "../util/fsUtils.js";

export type RepositoryProtocol = "https" | "ssh";

export interface RepositoryRef {
  readonly host: string;
  readonly owner: string;
  readonly name: string;
  readonly protocol: RepositoryProtocol;
}

export class InvalidRepositoryError extends Error {
  constructor(input: string, reason: string) {
    super(`Invalid repository '${input}': ${reason}`);
    this.name = "InvalidRepositoryError";
  }
}

export const DEFAULT_HOST = "github.com";

const SEGMENT = /^[A-Za-z0-9_.-]+$/;

function checkSegment(input: string, label: string, value: string) {
  if (!value || !SEGMENT.test(value) || value === "." || value === "..") {
    throw new InvalidRepositoryError(input, `${label} '${value}' is not a valid name`);
  }
}

export function createRepositoryRef(fields: {
  host?: string;
  owner: string;
  name: string;
  protocol?: RepositoryProtocol;
}): RepositoryRef {
  const host = (fields.host || DEFAULT_HOST).trim();
  const owner = fields.owner.trim();
  const name = fields.name.trim().replace(/\.git$/i, "");
  const label = `${host}/${owner}/${name}`;
  if (!host || /[\s/@]/.test(host)) {
    throw new InvalidRepositoryError(label, `host '${host}' is not valid`);
  }
  checkSegment(label, "owner", owner);
  checkSegment(label, "name", name);
  return Object.freeze({ host, owner, name, protocol: fields.protocol ?? "https" });
}

function splitPath(input: string, rawPath: string): [string, string] {
  const pieces = rawPath
    .replace(/^\/+/, "")
    .replace(/\/+$/, "")
    .split("/")
    .filter(Boolean);
  if (pieces.length !== 2) {
    throw new InvalidRepositoryError(input, "expected <owner>/<name>");
  }
  return [pieces[0], pieces[1]];
}

/**
 * Accepts `https://host/owner/name(.git)`, `ssh://git@host/owner/name(.git)`,
 * scp-style `git@host:owner/name(.git)` and the `owner/name` shorthand, which
 * resolves against github.com. An explicit `protocol` wins over the one
 * implied by the URL.
 */
export function parseRepositoryUrl(input: string, protocol?: RepositoryProtocol): RepositoryRef {
  const trimmed = input.trim();
  if (!trimmed) throw new InvalidRepositoryError(input, "value is empty");

  if (trimmed.includes("://")) {
    let url: URL;
    try {
      url = new URL(trimmed);
    } catch {
      throw new InvalidRepositoryError(trimmed, "unparseable URL");
    }
    const scheme = url.protocol.replace(/:$/, "").toLowerCase();
    if (!["https", "http", "ssh", "git+ssh"].includes(scheme)) {
      throw new InvalidRepositoryError(trimmed, `unsupported scheme '${scheme}'`);
    }
    const [owner, name] = splitPath(trimmed, url.pathname);
    return createRepositoryRef({
      host: url.hostname,
      owner,
      name,
      protocol: protocol ?? (scheme.endsWith("ssh") ? "ssh" : "https"),
    });
  }

  const scp = /^(?:[^@\s]+@)([^:\s]+):(.+)$/.exec(trimmed);
  if (scp) {
    const [owner, name] = splitPath(trimmed, scp[2]);
    return createRepositoryRef({ host: scp[1], owner, name, protocol: protocol ?? "ssh" });
  }

  const [owner, name] = splitPath(trimmed, trimmed);
  return createRepositoryRef({ owner, name, protocol: protocol ?? "https" });
}

export function repoKey(repo: Pick<RepositoryRef, "host" | "owner" | "name">): string {
  return `${repo.host}/${repo.owner}/${repo.name}`.toLowerCase();
}

export function remoteUrlFor(repo: RepositoryRef, protocol: RepositoryProtocol = repo.protocol): string {
  if (protocol === "ssh") return `git@${repo.host}:${repo.owner}/${repo.name}.git`;
  return `https://${repo.host}/${repo.owner}/${repo.name}.git`;
}

// `_` joins owner and name, so it is escaped inside each segment.
function escapeSegment(seg: string): string {
  return seg.toLowerCase().replace(/%/g, "%25").replace(/_/g, "%5f");
}

export function workspaceDirName(repo: RepositoryRef): string {
  return `${escapeSegment(repo.owner)}_${escapeSegment(repo.name)}`;
}

// Repositories on other hosts get a host directory so identical owner/name
// pairs never share a checkout.
export function workspacePathFor(workspaceRoot: string, repo: RepositoryRef): string {
  if (repo.host.toLowerCase() === DEFAULT_HOST) {
    return path.join(workspaceRoot, workspaceDirName(repo));
  }
  return path.join(workspaceRoot, sanitizeSegment(repo.host), workspaceDirName(repo));
}
