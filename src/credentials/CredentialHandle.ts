export const CREDENTIAL_METHODS = [
  "collaborator-token",
  "pat",
  "fine-grained-pat",
  "deploy-key",
  "github-app-installation",
] as const;

export type CredentialMethod = (typeof CREDENTIAL_METHODS)[number];

export type CredentialScope = "read" | "write";

export const DEFAULT_CREDENTIAL_PREFERENCE: readonly CredentialMethod[] = [
  "deploy-key",
  "fine-grained-pat",
  "pat",
  "collaborator-token",
  "github-app-installation",
];

export function isCredentialMethod(value: string): value is CredentialMethod {
  return CREDENTIAL_METHODS.some((method) => method === value);
}

/** Deploy keys only work over SSH; every token method authenticates HTTPS. */
export function transportFor(tag: CredentialMethod): "https" | "ssh" {
  return tag === "deploy-key" ? "ssh" : "https";
}

export interface CredentialHandle {
  readonly tag: CredentialMethod;
  readonly expiresAt: Date | null;
  readonly scope: CredentialScope;
  toJSON(): CredentialSummary;
}

export interface CredentialSummary {
  tag: CredentialMethod;
  expiresAt: string | null;
  scope: CredentialScope;
}

interface SealedSecret {
  secret: string;
  username?: string;
}

const sealed = new WeakMap<CredentialHandle, SealedSecret>();

export function createCredentialHandle(
  tag: CredentialMethod,
  secret: string,
  options: { expiresAt?: Date | null; scope?: CredentialScope; username?: string } = {},
): CredentialHandle {
  const expiresAt = options.expiresAt ?? null;
  const scope = options.scope ?? "read";
  const handle: CredentialHandle = Object.freeze({
    tag,
    expiresAt,
    scope,
    toJSON: () => ({ tag, expiresAt: expiresAt ? expiresAt.toISOString() : null, scope }),
  });
  sealed.set(handle, { secret, username: options.username });
  return handle;
}

export function isExpired(expiresAt: Date | null | undefined, now: Date): boolean {
  return !!expiresAt && expiresAt.getTime() <= now.getTime();
}

// Only the git auth layer calls this; the secret never leaves process memory
// through any other path.
export function revealSecret(handle: CredentialHandle): SealedSecret {
  const value = sealed.get(handle);
  if (!value) throw new Error(`Credential handle (${handle.tag}) was not issued by this process`);
  return value;
}

export function preferenceFor(
  hint?: CredentialMethod | null,
  base: readonly CredentialMethod[] = DEFAULT_CREDENTIAL_PREFERENCE,
): CredentialMethod[] {
  if (!hint) return [...base];
  return [hint, ...base.filter((m) => m !== hint)];
}

export function parsePreference(values: string[]): CredentialMethod[] {
  const methods = values.map((v) => v.trim().toLowerCase()).filter(isCredentialMethod);
  return methods.length ? Array.from(new Set(methods)) : [...DEFAULT_CREDENTIAL_PREFERENCE];
}
