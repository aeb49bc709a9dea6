import Fastify, { type FastifyInstance } from "fastify";
import type { WorkflowCoordinator } from "../coordinator/WorkflowCoordinator.js";
import type { EventChangeDetector } from "../detect/EventChangeDetector.js";
import { registerHealthRoutes } from "./routes/health.js";
import { registerStatusRoutes } from "./routes/status.js";
import { registerWebhookRoutes } from "./routes/webhooks.js";

export interface ServerDeps {
  coordinator: WorkflowCoordinator;
  events: EventChangeDetector | null;
  webhookSecret?: string;
}

export function build(deps: ServerDeps): FastifyInstance {
  const fastify = Fastify({ logger: false, bodyLimit: 5 * 1024 * 1024 });

  // keep the raw bytes; the webhook signature is computed over them
  fastify.removeContentTypeParser("application/json");
  fastify.addContentTypeParser("application/json", { parseAs: "buffer" }, (_request, body, done) => {
    done(null, body);
  });

  registerHealthRoutes(fastify, deps.coordinator);
  registerStatusRoutes(fastify, deps.coordinator);
  registerWebhookRoutes(fastify, {
    coordinator: deps.coordinator,
    events: deps.events,
    secret: deps.webhookSecret,
  });

  return fastify;
}
