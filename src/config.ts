import "dotenv/config";
import path from "path";

function expandHome(p: string | undefined): string | undefined {
  if (!p) return p;
  return p.replace(
    /^~(?=$|\/|\\)/,
    process.env.HOME || process.env.USERPROFILE || "~",
  );
}

function resolvePath(p: string): string {
  return path.resolve(expandHome(p) ?? p);
}

export function bool(v: string | undefined, def = false) {
  if (v === undefined) return def;
  return ["1", "true", "yes", "on"].includes(v.toLowerCase());
}

export function splitCsv(value: string | undefined, fallback: string[]): string[] {
  if (!value) return fallback;
  return value
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

function unquote(value: string): string {
  if (
    (value.startsWith("'") && value.endsWith("'")) ||
    (value.startsWith('"') && value.endsWith('"'))
  )
    return value.slice(1, -1).trim();
  return value;
}

export function parseDurationMs(value: string | undefined, fallbackMs: number) {
  if (!value) return fallbackMs;
  const s = unquote(value.toString().trim());
  if (!s.length) return fallbackMs;

  const m = s.match(/^([0-9]+(?:\.[0-9]+)?)\s*(ms|s|m|min|h)?$/i);
  if (m) {
    const num = Number(m[1]);
    if (!Number.isFinite(num) || num <= 0) return fallbackMs;
    const unit = (m[2] || "").toLowerCase();
    if (unit === "ms") return Math.floor(num);
    if (unit === "s") return Math.floor(num * 1000);
    if (unit === "m" || unit === "min") return Math.floor(num * 60 * 1000);
    if (unit === "h") return Math.floor(num * 60 * 60 * 1000);
    // bare numbers are milliseconds; every duration key ends in _MS
    return Math.floor(num);
  }
  return fallbackMs;
}

export function parsePositiveInt(value: string | undefined, fallback: number): number {
  if (!value || !value.trim().length) return fallback;
  const num = Number(value.trim());
  if (!Number.isFinite(num) || num <= 0) return fallback;
  return Math.floor(num);
}

function parseInstant(value: string | undefined): Date | null {
  if (!value || !value.trim().length) return null;
  const parsed = new Date(unquote(value.trim()));
  if (Number.isNaN(parsed.getTime())) {
    console.warn(`[config] ignoring unparseable expiry instant '${value}'`);
    return null;
  }
  return parsed;
}

function tokenSecret(token: string | undefined, expires: string | undefined) {
  const secret = (token || "").trim();
  return { secret, expiresAt: parseInstant(expires) };
}

const workspaceRoot = resolvePath(process.env.WORKSPACE_ROOT || "./workspaces");

const stateDbPath = (() => {
  const raw = process.env.STATE_DB_PATH;
  if (raw && raw.trim().length) return resolvePath(raw.trim());
  return "";
})();

const repositoriesFile = (() => {
  const raw = process.env.REPOSITORIES_FILE;
  if (raw && raw.trim().length) return resolvePath(raw.trim());
  return "";
})();

function detectorMode(value: string | undefined): "polling" | "events" | "both" {
  const mode = (value || "polling").trim().toLowerCase();
  if (mode === "events" || mode === "both") return mode;
  return "polling";
}

const logFile = (() => {
  const custom = process.env.LOG_FILE;
  if (custom && custom.trim().length) return path.resolve(custom);
  return "";
})();

export const cfg = {
  transportType: (process.env.TRANSPORT_TYPE || "redis").toLowerCase() === "local"
    ? ("local" as const)
    : ("redis" as const),

  redisUrl: process.env.REDIS_URL || "redis://localhost:6379",
  redisPassword: process.env.REDIS_PASSWORD || undefined,
  discoveryStream: process.env.DISCOVERY_STREAM || "repo.discovery",
  reportStream: process.env.REPORT_STREAM || "repo.reports",
  reanalysisStream: process.env.REANALYSIS_STREAM || "repo.reanalysis",
  groupPrefix: process.env.GROUP_PREFIX || "cg",
  consumerId: process.env.CONSUMER_ID || "orchestrator-1",

  workspaceRoot,
  repositoriesFile,
  stateDbPath,

  credentialPreference: splitCsv(process.env.CREDENTIAL_PREFERENCE, []),

  credentials: {
    pat: tokenSecret(process.env.GIT_AUTH_TOKEN, process.env.GIT_AUTH_TOKEN_EXPIRES_AT),
    fineGrainedPat: tokenSecret(
      process.env.GIT_FINE_GRAINED_TOKEN,
      process.env.GIT_FINE_GRAINED_TOKEN_EXPIRES_AT,
    ),
    collaboratorToken: tokenSecret(
      process.env.GIT_COLLABORATOR_TOKEN,
      process.env.GIT_COLLABORATOR_TOKEN_EXPIRES_AT,
    ),
    appInstallationToken: tokenSecret(
      process.env.GIT_APP_INSTALLATION_TOKEN,
      process.env.GIT_APP_INSTALLATION_TOKEN_EXPIRES_AT,
    ),
    sshKeyPath: process.env.GIT_SSH_KEY_PATH
      ? resolvePath(process.env.GIT_SSH_KEY_PATH)
      : "",
    sshKeyExpiresAt: parseInstant(process.env.GIT_SSH_KEY_EXPIRES_AT),
    username: (process.env.GIT_AUTH_USERNAME || "").trim(),
    writeAccess: bool(process.env.GIT_CREDENTIALS_WRITE, false),
  },

  sync: {
    maxAttempts: parsePositiveInt(process.env.SYNC_MAX_ATTEMPTS, 3),
    initialDelayMs: parseDurationMs(process.env.SYNC_BACKOFF_INITIAL_MS, 500),
    maxDelayMs: parseDurationMs(process.env.SYNC_BACKOFF_MAX_MS, 30000),
    maxJitterMs: parseDurationMs(process.env.SYNC_BACKOFF_JITTER_MS, 300),
    concurrency: parsePositiveInt(process.env.SYNC_CONCURRENCY, 4),
    timeoutMs: parseDurationMs(process.env.SYNC_TIMEOUT_MS, 300000),
  },

  detector: {
    mode: detectorMode(process.env.DETECTOR),
    pollIntervalMs: parseDurationMs(process.env.POLL_INTERVAL_MS, 60000),
    tickMs: parseDurationMs(process.env.DETECTOR_TICK_MS, 1000),
    debounceWindowMs: parseDurationMs(process.env.DEBOUNCE_WINDOW_MS, 5000),
  },

  webhook: {
    host: process.env.WEBHOOK_HOST || "0.0.0.0",
    port: Number(process.env.WEBHOOK_PORT || 0),
    secret: process.env.WEBHOOK_SECRET || "",
  },

  reanalysis: {
    endpoint: (process.env.REANALYSIS_ENDPOINT || "").trim(),
    apiKey: process.env.REANALYSIS_API_KEY || "",
  },

  log: {
    level: (process.env.LOG_LEVEL || "info").toLowerCase(),
    file: logFile,
    console: bool(process.env.LOG_CONSOLE, true),
  },
};

export type Config = typeof cfg;
