#!/usr/bin/env node
import { cfg } from "../config.js";
import { isCredentialMethod, parsePreference, preferenceFor } from "../credentials/CredentialHandle.js";
import { CredentialResolver } from "../credentials/CredentialResolver.js";
import { EnvSecretStore } from "../credentials/SecretStore.js";
import { Job } from "../jobs/Job.js";
import { JobRunner } from "../jobs/JobRunner.js";
import { logger } from "../logger.js";
import { NoopReanalysisTrigger } from "../reanalysis/ReanalysisTrigger.js";
import { parseRepositoryUrl } from "../repos/RepositoryRef.js";
import { SqlStateStore } from "../store/SqlStateStore.js";
import { SyncEngine } from "../sync/SyncEngine.js";

// usage: repo-sync-once <repository> [--access <method>]
const args = process.argv.slice(2);
const target = args.find((a) => !a.startsWith("--"));
const accessIndex = args.indexOf("--access");
const access = accessIndex >= 0 ? args[accessIndex + 1] : undefined;

if (!target) {
  console.error("usage: repo-sync-once <repository-url | owner/name> [--access <method>]");
  process.exit(2);
}
if (access && !isCredentialMethod(access)) {
  console.error(`unknown access method '${access}'`);
  process.exit(2);
}

const repo = parseRepositoryUrl(target);
const store = await SqlStateStore.open(cfg.stateDbPath || null);
const preference = parsePreference(cfg.credentialPreference);
const runner = new JobRunner({
  credentials: new CredentialResolver(new EnvSecretStore(cfg.credentials)),
  syncer: new SyncEngine({ workspaceRoot: cfg.workspaceRoot, timeoutMs: cfg.sync.timeoutMs }),
  watermarks: store,
  reanalysis: new NoopReanalysisTrigger(),
  preference,
  retry: {
    maxAttempts: cfg.sync.maxAttempts,
    initialDelayMs: cfg.sync.initialDelayMs,
    maxDelayMs: cfg.sync.maxDelayMs,
    maxJitterMs: cfg.sync.maxJitterMs,
  },
});

const job = new Job(repo);
if (access && isCredentialMethod(access)) job.credentialPreference = preferenceFor(access, preference);

const controller = new AbortController();
process.on("SIGINT", () => controller.abort());

const report = await runner.runPass(job, controller.signal);
await store.append(report);
store.close();
logger.debug("sync_once finished", { repository: report.repository, state: report.state });
console.log(JSON.stringify(report, null, 2));
process.exit(report.state === "FAILED" ? 1 : 0);
