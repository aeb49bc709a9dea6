import type { FastifyInstance } from "fastify";
import type { WorkflowCoordinator } from "../../coordinator/WorkflowCoordinator.js";
import { sinceMillis } from "../../reports/ReportLog.js";

export function registerStatusRoutes(fastify: FastifyInstance, coordinator: WorkflowCoordinator) {
  /**
   * GET /jobs
   * Current state of every tracked repository
   */
  fastify.get("/jobs", async (_request, reply) => {
    return reply.send(coordinator.status());
  });

  /**
   * GET /reports?since=<ISO timestamp | epoch ms>
   * Reports cut at or after `since`, oldest first
   */
  fastify.get<{ Querystring: { since?: string } }>("/reports", async (request, reply) => {
    const raw = request.query.since;
    let since = 0;
    if (raw) {
      try {
        since = /^\d+$/.test(raw) ? Number(raw) : sinceMillis(raw);
      } catch {
        return reply.code(400).send({ error: `Invalid since '${raw}'` });
      }
    }
    return reply.send(Array.from(coordinator.reportsSince(since)));
  });
}
