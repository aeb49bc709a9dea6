import fs from "fs/promises";
import { afterEach, describe, expect, it } from "vitest";
import { WorkflowCoordinator } from "../src/coordinator/WorkflowCoordinator.js";
import { EventChangeDetector } from "../src/detect/EventChangeDetector.js";
import { AbortedError } from "../src/errors.js";
import type { ReportSink } from "../src/reports/ReportLog.js";
import type { WorkflowReport } from "../src/reports/WorkflowReport.js";
import { createRepositoryRef, parseRepositoryUrl } from "../src/repos/RepositoryRef.js";
import { MemoryWatermarkStore } from "../src/store/WatermarkStore.js";
import { SyncEngine } from "../src/sync/SyncEngine.js";
import type { SyncResult } from "../src/sync/types.js";
import { FakeSyncer, fullResult, gate, makeRunner } from "./helpers/fakes.js";
import { makeTempDir, makeTempRemote } from "./makeTempRepo.js";

const widgets = parseRepositoryUrl("acme/widgets");

/** Syncer whose passes block until released, tracking how many run at once. */
function blockingSyncer() {
  const state = { active: 0, maxActive: 0, perRepo: new Map<string, number>(), maxPerRepo: 0 };
  const current = gate();
  const syncer = new FakeSyncer(async (request) => {
    const key = `${request.repo.owner}/${request.repo.name}`;
    state.active++;
    state.maxActive = Math.max(state.maxActive, state.active);
    const mine = (state.perRepo.get(key) ?? 0) + 1;
    state.perRepo.set(key, mine);
    state.maxPerRepo = Math.max(state.maxPerRepo, mine);
    try {
      await current.opened;
      return fullResult();
    } finally {
      state.active--;
      state.perRepo.set(key, (state.perRepo.get(key) ?? 1) - 1);
    }
  });
  return {
    syncer,
    state,
    release() {
      current.open();
    },
  };
}

async function waitFor(condition: () => boolean) {
  for (let i = 0; i < 500 && !condition(); i++) {
    await new Promise((resolve) => setTimeout(resolve, 2));
  }
  if (!condition()) throw new Error("condition not reached");
}

describe("WorkflowCoordinator", () => {
  let coordinator: WorkflowCoordinator | null = null;

  afterEach(async () => {
    await coordinator?.shutdown();
    coordinator = null;
  });

  it("rejects a non-positive concurrency", () => {
    const { runner } = makeRunner({ syncer: new FakeSyncer() });
    expect(() => new WorkflowCoordinator({ runner, concurrency: 0 })).toThrow(RangeError);
  });

  it("collapses a storm of requests into one follow-up pass", async () => {
    const blocking = blockingSyncer();
    const { runner } = makeRunner({ syncer: blocking.syncer });
    coordinator = new WorkflowCoordinator({ runner, concurrency: 4 });

    const outcomes = Array.from({ length: 10 }, () => coordinator?.enqueue(widgets));
    await waitFor(() => blocking.syncer.calls.length === 1);
    blocking.release();
    await coordinator.idle();

    expect(outcomes[0]).toBe("queued");
    expect(outcomes.slice(1)).toEqual(Array(9).fill("rerun-scheduled"));
    expect(blocking.syncer.calls).toHaveLength(2);
    expect(blocking.state.maxPerRepo).toBe(1);
    expect(coordinator.reportLog.size).toBe(2);
    expect(coordinator.jobFor(widgets)?.passCount).toBe(2);
  });

  it("answers already-pending for a repository waiting for a slot", async () => {
    const blocking = blockingSyncer();
    const { runner } = makeRunner({ syncer: blocking.syncer });
    coordinator = new WorkflowCoordinator({ runner, concurrency: 1 });
    const gadgets = parseRepositoryUrl("acme/gadgets");

    expect(coordinator.enqueue(widgets)).toBe("queued");
    expect(coordinator.enqueue(gadgets)).toBe("queued");
    expect(coordinator.enqueue(gadgets)).toBe("already-pending");

    blocking.release();
    await coordinator.idle();
    expect(blocking.syncer.calls).toHaveLength(2);
  });

  it("never runs more passes than the concurrency bound", async () => {
    const blocking = blockingSyncer();
    const { runner } = makeRunner({ syncer: blocking.syncer });
    coordinator = new WorkflowCoordinator({ runner, concurrency: 2 });

    for (const name of ["a", "b", "c", "d"]) coordinator.enqueue(createRepositoryRef({ owner: "acme", name }));
    await waitFor(() => blocking.syncer.calls.length === 2);

    expect(coordinator.runningCount).toBe(2);
    expect(coordinator.status().filter((s) => s.queued)).toHaveLength(2);

    blocking.release();
    await coordinator.idle();
    expect(blocking.state.maxActive).toBe(2);
    expect(coordinator.reportLog.size).toBe(4);
  });

  it("dispatches once for a burst of push events", async () => {
    let clock = 0;
    const events = new EventChangeDetector({ windowMs: 5000, now: () => clock });
    const syncer = new FakeSyncer();
    const { runner } = makeRunner({ syncer });
    coordinator = new WorkflowCoordinator({ runner, concurrency: 2, detector: events });
    coordinator.track(widgets);

    for (let i = 0; i < 5; i++) events.notify({ repo: widgets });
    clock = 4000;
    expect(await coordinator.tick()).toBe(0);
    clock = 5000;
    expect(await coordinator.tick()).toBe(1);
    expect(await coordinator.tick()).toBe(0);
    await coordinator.idle();

    expect(syncer.calls).toHaveLength(1);
  });

  it("moves the access hint to the front of the credential preference", () => {
    const { runner } = makeRunner({ syncer: new FakeSyncer() });
    coordinator = new WorkflowCoordinator({ runner, concurrency: 1, preference: ["pat", "deploy-key"] });

    const job = coordinator.track(widgets, { accessHint: "deploy-key" });
    expect(job.credentialPreference).toEqual(["deploy-key", "pat"]);
  });

  it("serves reports by timestamp", async () => {
    let current = new Date("2026-01-01T10:00:00.000Z");
    const { runner } = makeRunner({ syncer: new FakeSyncer(), now: () => current });
    coordinator = new WorkflowCoordinator({ runner, concurrency: 1 });

    coordinator.enqueue(widgets);
    await coordinator.idle();
    current = new Date("2026-01-01T11:00:00.000Z");
    coordinator.enqueue(widgets);
    await coordinator.idle();

    const all = Array.from(coordinator.reportsSince(0));
    const later = coordinator.reportsSince("2026-01-01T10:30:00.000Z");
    expect(all.map((r) => r.timestamp)).toEqual(["2026-01-01T10:00:00.000Z", "2026-01-01T11:00:00.000Z"]);
    expect(Array.from(later).map((r) => r.timestamp)).toEqual(["2026-01-01T11:00:00.000Z"]);
    expect(Array.from(later)).toHaveLength(1);
    expect(Array.from(coordinator.reportsSince(new Date("2027-01-01T00:00:00.000Z")))).toEqual([]);
  });

  it("bounds a report view to the reports present when it was taken", async () => {
    const { runner } = makeRunner({ syncer: new FakeSyncer() });
    coordinator = new WorkflowCoordinator({ runner, concurrency: 1 });
    coordinator.enqueue(widgets);
    await coordinator.idle();

    const view = coordinator.reportsSince(0);
    coordinator.enqueue(widgets);
    await coordinator.idle();

    expect(Array.from(view)).toHaveLength(1);
    expect(Array.from(coordinator.reportsSince(0))).toHaveLength(2);
  });

  it("keeps publishing when a sink fails", async () => {
    const received: WorkflowReport[] = [];
    const failing: ReportSink = {
      name: "failing",
      append: async () => {
        throw new Error("sink down");
      },
    };
    const recording: ReportSink = {
      name: "recording",
      append: async (report) => {
        received.push(report);
      },
    };
    const { runner } = makeRunner({ syncer: new FakeSyncer() });
    coordinator = new WorkflowCoordinator({ runner, concurrency: 1, sinks: [failing, recording] });

    coordinator.enqueue(widgets);
    await coordinator.idle();

    expect(received).toHaveLength(1);
    expect(coordinator.reportLog.size).toBe(1);
  });

  it("interrupts running passes on shutdown and refuses new work", async () => {
    const syncer = new FakeSyncer(
      (request) =>
        new Promise<SyncResult>((_resolve, reject) => {
          request.signal?.addEventListener("abort", () => reject(new AbortedError("git operation aborted")), {
            once: true,
          });
        }),
    );
    const { runner } = makeRunner({ syncer });
    coordinator = new WorkflowCoordinator({ runner, concurrency: 1 });

    coordinator.enqueue(widgets);
    coordinator.enqueue(parseRepositoryUrl("acme/gadgets"));
    await waitFor(() => syncer.calls.length === 1);
    await coordinator.shutdown();

    const reports = Array.from(coordinator.reportsSince(0));
    expect(reports).toHaveLength(1);
    expect(reports[0]).toMatchObject({ state: "REPORTED", outcome: "SYNCING", errorKind: "Aborted" });
    expect(coordinator.isShuttingDown).toBe(true);
    expect(coordinator.enqueue(widgets)).toBe("shutting-down");
    expect(coordinator.jobFor(widgets)?.state).toBe("PENDING");
  });

  it("synchronizes a real repository end to end", async () => {
    const remote = await makeTempRemote({ "README.md": "# widgets\n", "src/index.ts": "export {};\n" });
    const root = await makeTempDir("orchestrator-e2e-");
    try {
      const engine = new SyncEngine({ workspaceRoot: root, remoteUrlFor: () => remote.bare });
      const watermarks = new MemoryWatermarkStore();
      const { runner, reanalysis } = makeRunner({ syncer: engine, watermarks });
      coordinator = new WorkflowCoordinator({ runner, concurrency: 1 });
      const repo = createRepositoryRef({ host: "github.com", owner: "acme", name: "widgets" });

      expect(coordinator.enqueue(repo)).toBe("queued");
      await coordinator.idle();

      const [report] = Array.from(coordinator.reportsSince(0));
      const head = await remote.head();
      expect(report).toMatchObject({
        repository: "github.com/acme/widgets",
        state: "REPORTED",
        errorKind: null,
        full: true,
        changedPathCount: 2,
        watermark: head,
        reanalysis: "queued",
      });
      expect(coordinator.jobFor(repo)?.lastResult?.mode).toBe("initial");
      expect((await watermarks.get(repo))?.commit).toBe(head);
      expect(reanalysis.requests[0].changedPaths).toEqual(["README.md", "src/index.ts"]);
    } finally {
      await remote.cleanup();
      await fs.rm(root, { recursive: true, force: true });
    }
  });
});
