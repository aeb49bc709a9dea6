import fs from "fs";
import path from "path";
import { cfg } from "./config.js";

type Level = "error" | "warn" | "info" | "debug" | "trace";

const LEVELS: Record<Level, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4
};

function isLevel(value: string): value is Level {
  return value in LEVELS;
}

const configuredLevel: Level = isLevel(cfg.log.level) ? cfg.log.level : "info";

const minLevel = LEVELS[configuredLevel];
const consoleEnabled = cfg.log.console;
const logFile = cfg.log.file;

const REDACTED = "[redacted]";
const SECRET_KEY_PATTERN = /(secret|token|password|passphrase|authorization|private.?key|credential.?value)/i;

let stream: fs.WriteStream | null = null;

function ensureStream() {
  if (!logFile) return null;
  if (stream) return stream;
  try {
    fs.mkdirSync(path.dirname(logFile), { recursive: true });
  } catch (e) {
    console.error('[logger] failed to create log directory', e);
  }
  try {
    const header = `# orchestrator log (level=${configuredLevel}) started ${new Date().toISOString()}\n`;
    try {
      fs.appendFileSync(logFile, header);
    } catch (e) {
      console.error('[logger] failed to write log header', e);
    }
    stream = fs.createWriteStream(logFile, { flags: "a" });

    stream.on('error', (err) => {
      console.error('[logger] write stream error', err);
      stream?.end();
      stream = null;
    });
  } catch (e) {
    console.error("[logger] failed to create log file stream", e);
    stream = null;
  }
  return stream;
}

export function getLogFilePath() {
  return logFile;
}

export function isFileLoggingActive() {
  return !!stream;
}

/**
 * Makes log metadata JSON-safe: errors become plain objects and any key that
 * looks like it carries a secret is replaced before the entry is written.
 */
export function serialize(value: unknown, key?: string): unknown {
  if (key !== undefined && SECRET_KEY_PATTERN.test(key) && value !== null && value !== undefined) {
    if (typeof value === "string" || typeof value === "number" || Buffer.isBuffer(value)) {
      return REDACTED;
    }
  }
  if (value instanceof Error) {
    const base: Record<string, unknown> = {
      name: value.name,
      message: value.message,
      stack: value.stack
    };
    for (const [k, v] of Object.entries(value)) {
      if (v !== undefined) base[k] = serialize(v, k);
    }
    return base;
  }
  if (value instanceof Date) return value.toISOString();
  if (!value || typeof value !== "object") return value;
  if (Array.isArray(value)) return value.map((v) => serialize(v));
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) {
    out[k] = serialize(v, k);
  }
  return out;
}

function write(level: Level, message: string, meta?: unknown) {
  if (LEVELS[level] > minLevel) return;
  const entry: Record<string, unknown> = {
    ts: new Date().toISOString(),
    level,
    msg: message
  };
  if (meta !== undefined) entry.meta = serialize(meta);

  if (consoleEnabled) {
    const consoleMethod = level === "error" ? console.error : level === "warn" ? console.warn : console.log;
    if (entry.meta !== undefined) {
      consoleMethod(`[${level}] ${message}`, entry.meta);
    } else {
      consoleMethod(`[${level}] ${message}`);
    }
  }
  const s = ensureStream();
  if (s) {
    s.write(JSON.stringify(entry) + "\n");
  }
}

export const logger = {
  error(message: string, meta?: unknown) { write("error", message, meta); },
  warn(message: string, meta?: unknown) { write("warn", message, meta); },
  info(message: string, meta?: unknown) { write("info", message, meta); },
  debug(message: string, meta?: unknown) { write("debug", message, meta); },
  trace(message: string, meta?: unknown) { write("trace", message, meta); }
};

export type Logger = typeof logger;

if (logFile) {
  ensureStream();
  if (consoleEnabled) {
    console.log(`[logger] writing to ${logFile} at level ${configuredLevel}`);
  }
}
