import type { FastifyInstance } from "fastify";
import type { WorkflowCoordinator } from "../../coordinator/WorkflowCoordinator.js";

const startTime = Date.now();

export function registerHealthRoutes(fastify: FastifyInstance, coordinator: WorkflowCoordinator) {
  fastify.get("/health", async (_request, reply) => {
    const shuttingDown = coordinator.isShuttingDown;
    return reply.status(shuttingDown ? 503 : 200).send({
      status: shuttingDown ? "shutting-down" : "ok",
      timestamp: new Date().toISOString(),
      uptime: Date.now() - startTime,
      tracked: coordinator.jobs().length,
      running: coordinator.runningCount,
    });
  });
}
