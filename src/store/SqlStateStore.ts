import fs from "fs";
import path from "path";
import sqlJs, { type Database, type SqlJsStatic } from "sql.js";
import { logger } from "../logger.js";
import type { ReportSink, Since } from "../reports/ReportLog.js";
import { sinceMillis } from "../reports/ReportLog.js";
import type { WorkflowReport } from "../reports/WorkflowReport.js";
import { repoKey, type RepositoryRef } from "../repos/RepositoryRef.js";
import { WatermarkSchema, WorkflowReportSchema } from "../schema.js";
import type { Watermark } from "../sync/types.js";
import type { WatermarkStore } from "./WatermarkStore.js";

const SCHEMA = `
CREATE TABLE IF NOT EXISTS watermarks (
  repository TEXT PRIMARY KEY,
  commit_id TEXT NOT NULL,
  synced_at TEXT NOT NULL
);
CREATE TABLE IF NOT EXISTS reports (
  id TEXT PRIMARY KEY,
  repository TEXT NOT NULL,
  ts_ms INTEGER NOT NULL,
  body TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_reports_ts ON reports (ts_ms);
`;

type InitSqlJs = () => Promise<SqlJsStatic>;

function isInitializer(value: unknown): value is InitSqlJs {
  return typeof value === "function";
}

// sql.js is CommonJS: the initializer is the module itself or its `default`.
function initializer(): InitSqlJs {
  const mod: unknown = sqlJs;
  if (isInitializer(mod)) return mod;
  const nested: unknown = typeof mod === "object" && mod !== null ? Reflect.get(mod, "default") : undefined;
  if (isInitializer(nested)) return nested;
  throw new Error("sql.js did not expose an initializer");
}

let SQL: SqlJsStatic | null = null;

async function initSQL(): Promise<SqlJsStatic> {
  if (!SQL) {
    SQL = await initializer()();
  }
  return SQL;
}

function text(value: unknown): string {
  return typeof value === "string" ? value : "";
}

/**
 * Durable watermarks and reports in a sql.js database. With a file path the
 * whole database is exported to disk after every write; without one it lives
 * in memory only.
 */
export class SqlStateStore implements WatermarkStore, ReportSink {
  readonly name = "sql";

  private constructor(private readonly db: Database, private readonly dbPath: string | null) {}

  static async open(dbPath?: string | null): Promise<SqlStateStore> {
    const SQLModule = await initSQL();
    const file = dbPath ? path.resolve(dbPath) : null;

    let db: Database;
    if (file && fs.existsSync(file)) {
      db = new SQLModule.Database(fs.readFileSync(file));
    } else {
      db = new SQLModule.Database();
    }
    db.exec(SCHEMA);

    const store = new SqlStateStore(db, file);
    logger.debug("state store opened", { path: file ?? ":memory:" });
    return store;
  }

  async get(repo: RepositoryRef): Promise<Watermark | null> {
    const stmt = this.db.prepare("SELECT commit_id, synced_at FROM watermarks WHERE repository = ?");
    try {
      stmt.bind([repoKey(repo)]);
      if (!stmt.step()) return null;
      const row = stmt.getAsObject();
      const parsed = WatermarkSchema.safeParse({ commit: text(row.commit_id), syncedAt: text(row.synced_at) });
      if (!parsed.success) {
        logger.warn("ignoring malformed stored watermark", { repository: repoKey(repo) });
        return null;
      }
      return parsed.data;
    } finally {
      stmt.free();
    }
  }

  async set(repo: RepositoryRef, watermark: Watermark): Promise<void> {
    this.db.run(
      `INSERT INTO watermarks (repository, commit_id, synced_at) VALUES (?, ?, ?)
       ON CONFLICT(repository) DO UPDATE SET commit_id = excluded.commit_id, synced_at = excluded.synced_at`,
      [repoKey(repo), watermark.commit, watermark.syncedAt],
    );
    this.save();
  }

  async append(report: WorkflowReport): Promise<void> {
    this.db.run("INSERT INTO reports (id, repository, ts_ms, body) VALUES (?, ?, ?, ?)", [
      report.id,
      report.repository,
      Date.parse(report.timestamp),
      JSON.stringify(report),
    ]);
    this.save();
  }

  reportsSince(since: Since): WorkflowReport[] {
    const stmt = this.db.prepare("SELECT body FROM reports WHERE ts_ms >= ? ORDER BY ts_ms, rowid");
    const reports: WorkflowReport[] = [];
    try {
      stmt.bind([sinceMillis(since)]);
      while (stmt.step()) {
        const parsed = WorkflowReportSchema.safeParse(JSON.parse(text(stmt.getAsObject().body)));
        if (parsed.success) reports.push(Object.freeze(parsed.data));
      }
    } finally {
      stmt.free();
    }
    return reports;
  }

  close(): void {
    this.save();
    this.db.close();
  }

  private save(): void {
    if (!this.dbPath) return;
    fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
    fs.writeFileSync(this.dbPath, Buffer.from(this.db.export()));
  }
}
