import type { FastifyInstance } from "fastify";
import { cfg, type Config } from "./config.js";
import { WorkflowCoordinator } from "./coordinator/WorkflowCoordinator.js";
import { parsePreference, type CredentialMethod } from "./credentials/CredentialHandle.js";
import { CredentialResolver } from "./credentials/CredentialResolver.js";
import { EnvSecretStore, type SecretStore } from "./credentials/SecretStore.js";
import { AnyChangeDetector, type ChangeDetector } from "./detect/ChangeDetector.js";
import { EventChangeDetector } from "./detect/EventChangeDetector.js";
import { PollingChangeDetector } from "./detect/PollingChangeDetector.js";
import { DiscoveryConsumer } from "./discovery/DiscoveryConsumer.js";
import { loadRepositoriesFile } from "./discovery/repositoriesFile.js";
import { JobRunner } from "./jobs/JobRunner.js";
import { logger } from "./logger.js";
import { HttpReanalysisTrigger } from "./reanalysis/HttpReanalysisTrigger.js";
import type { ReanalysisTrigger } from "./reanalysis/ReanalysisTrigger.js";
import { StreamReanalysisTrigger } from "./reanalysis/StreamReanalysisTrigger.js";
import type { ReportSink } from "./reports/ReportLog.js";
import { StreamReportSink } from "./reports/StreamReportSink.js";
import type { RepositoryRef } from "./repos/RepositoryRef.js";
import { build } from "./server/webhookServer.js";
import { SqlStateStore } from "./store/SqlStateStore.js";
import { GitRemoteTipQuery } from "./sync/remote.js";
import { SyncEngine } from "./sync/SyncEngine.js";
import type { RemoteUrlResolver } from "./sync/types.js";
import { createTransport, type MessageTransport } from "./transport/index.js";

export interface OrchestratorOverrides {
  secrets?: SecretStore;
  transport?: MessageTransport;
  /** Separate connection for blocking discovery reads. */
  discoveryTransport?: MessageTransport;
  reanalysis?: ReanalysisTrigger;
  /** Where to fetch each repository from, e.g. a local mirror. */
  remoteUrlFor?: RemoteUrlResolver;
}

export interface Orchestrator {
  coordinator: WorkflowCoordinator;
  engine: SyncEngine;
  store: SqlStateStore;
  events: EventChangeDetector | null;
  server: FastifyInstance | null;
  discovery: DiscoveryConsumer;
  start(): Promise<void>;
  stop(): Promise<void>;
}

function makeDetector(
  config: Config,
  resolver: CredentialResolver,
  preference: readonly CredentialMethod[],
  coordinatorRef: () => WorkflowCoordinator,
  store: SqlStateStore,
  remoteUrlFor?: RemoteUrlResolver,
): { detector: ChangeDetector; events: EventChangeDetector | null } {
  const events =
    config.detector.mode === "polling" ? null : new EventChangeDetector({ windowMs: config.detector.debounceWindowMs });
  const candidatesFor = (repo: RepositoryRef) => coordinatorRef().jobFor(repo)?.credentialPreference ?? preference;
  const polling =
    config.detector.mode === "events"
      ? null
      : new PollingChangeDetector(
          new GitRemoteTipQuery(resolver, candidatesFor, { timeoutMs: config.sync.timeoutMs, remoteUrlFor }),
          store,
          { intervalMs: config.detector.pollIntervalMs },
        );
  const detectors = [polling, events].filter((d): d is PollingChangeDetector | EventChangeDetector => d !== null);
  const detector = detectors.length === 1 ? detectors[0] : new AnyChangeDetector(detectors);
  return { detector, events };
}

export async function createOrchestrator(
  config: Config = cfg,
  overrides: OrchestratorOverrides = {},
): Promise<Orchestrator> {
  const transport = overrides.transport ?? createTransport(config.transportType);
  const discoveryTransport = overrides.discoveryTransport ?? createTransport(config.transportType);
  const store = await SqlStateStore.open(config.stateDbPath || null);
  const resolver = new CredentialResolver(overrides.secrets ?? new EnvSecretStore(config.credentials));
  const preference = parsePreference(config.credentialPreference);
  const engine = new SyncEngine({
    workspaceRoot: config.workspaceRoot,
    timeoutMs: config.sync.timeoutMs,
    remoteUrlFor: overrides.remoteUrlFor,
  });

  const reanalysis =
    overrides.reanalysis ??
    (config.reanalysis.endpoint
      ? new HttpReanalysisTrigger({ endpoint: config.reanalysis.endpoint, apiKey: config.reanalysis.apiKey })
      : new StreamReanalysisTrigger(transport, config.reanalysisStream));

  const runner = new JobRunner({
    credentials: resolver,
    syncer: engine,
    watermarks: store,
    reanalysis,
    preference,
    retry: {
      maxAttempts: config.sync.maxAttempts,
      initialDelayMs: config.sync.initialDelayMs,
      maxDelayMs: config.sync.maxDelayMs,
      maxJitterMs: config.sync.maxJitterMs,
    },
  });

  let coordinator: WorkflowCoordinator | null = null;
  const coordinatorRef = () => {
    if (!coordinator) throw new Error("coordinator not initialised");
    return coordinator;
  };
  const { detector, events } = makeDetector(
    config,
    resolver,
    preference,
    coordinatorRef,
    store,
    overrides.remoteUrlFor,
  );

  const sinks: ReportSink[] = [store, new StreamReportSink(transport, config.reportStream)];
  coordinator = new WorkflowCoordinator({
    runner,
    concurrency: config.sync.concurrency,
    detector,
    tickMs: config.detector.tickMs,
    sinks,
    preference,
  });

  const discovery = new DiscoveryConsumer(discoveryTransport, coordinator, {
    stream: config.discoveryStream,
    group: `${config.groupPrefix}:discovery`,
    consumer: config.consumerId,
  });

  const server = config.webhook.port
    ? build({ coordinator, events, webhookSecret: config.webhook.secret || undefined })
    : null;

  const orchestrator: Orchestrator = {
    coordinator,
    engine,
    store,
    events,
    server,
    discovery,

    async start() {
      const current = coordinatorRef();
      await transport.connect();
      await discoveryTransport.connect();
      await engine.cleanupStaging();

      if (config.repositoriesFile) {
        for (const entry of await loadRepositoriesFile(config.repositoriesFile)) {
          current.enqueue(entry.repo, { accessHint: entry.accessHint });
        }
      }

      discovery.start();
      current.start();
      if (server) {
        const address = await server.listen({ port: config.webhook.port, host: config.webhook.host });
        logger.info("webhook server listening", { address });
      }
    },

    async stop() {
      const current = coordinatorRef();
      if (server) await server.close();
      await discovery.stop();
      await current.shutdown();
      store.close();
      await discoveryTransport.disconnect();
      await transport.disconnect();
    },
  };

  logger.info("orchestrator configured", {
    transport: config.transportType,
    workspaceRoot: config.workspaceRoot,
    detector: detector.name,
    concurrency: config.sync.concurrency,
    maxAttempts: config.sync.maxAttempts,
    credentialPreference: preference,
    stateDb: config.stateDbPath || ":memory:",
    webhookPort: config.webhook.port || null,
    reanalysis: config.reanalysis.endpoint ? "http" : "stream",
  });
  return orchestrator;
}
