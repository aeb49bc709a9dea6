import { createHmac, timingSafeEqual } from "crypto";
import type { FastifyInstance } from "fastify";
import type { WorkflowCoordinator } from "../../coordinator/WorkflowCoordinator.js";
import type { EventChangeDetector } from "../../detect/EventChangeDetector.js";
import { logger } from "../../logger.js";
import { parseRepositoryUrl, repoKey, type RepositoryRef } from "../../repos/RepositoryRef.js";
import { PushPayloadSchema, type PushPayload } from "../../schema.js";

export interface WebhookDeps {
  coordinator: WorkflowCoordinator;
  events: EventChangeDetector | null;
  secret?: string;
}

export function signPayload(secret: string, body: Buffer | string): string {
  return `sha256=${createHmac("sha256", secret).update(body).digest("hex")}`;
}

export function verifySignature(secret: string, body: Buffer, header: string | undefined): boolean {
  if (!header) return false;
  const expected = Buffer.from(signPayload(secret, body));
  const actual = Buffer.from(header);
  return expected.length === actual.length && timingSafeEqual(expected, actual);
}

function pushTarget(payload: PushPayload): { repo: RepositoryRef; tip: string | null } {
  if ("repository" in payload) {
    const source = payload.repository.clone_url ?? payload.repository.html_url ?? payload.repository.full_name;
    return { repo: parseRepositoryUrl(source), tip: payload.after ?? null };
  }
  return { repo: parseRepositoryUrl(payload.repo), tip: payload.tip ?? null };
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export function registerWebhookRoutes(fastify: FastifyInstance, deps: WebhookDeps) {
  /**
   * POST /webhooks/push
   * GitHub push payloads or { repo, tip }. Pushes for untracked repositories
   * are accepted and ignored.
   */
  fastify.post("/webhooks/push", async (request, reply) => {
    const body = Buffer.isBuffer(request.body) ? request.body : Buffer.alloc(0);

    if (deps.secret && !verifySignature(deps.secret, body, headerValue(request.headers["x-hub-signature-256"]))) {
      logger.warn("webhook signature rejected", { ip: request.ip });
      return reply.code(401).send({ error: "Invalid signature" });
    }

    if (headerValue(request.headers["x-github-event"]) === "ping") {
      return reply.code(200).send({ status: "pong" });
    }

    let json: unknown;
    try {
      json = JSON.parse(body.toString("utf8"));
    } catch {
      return reply.code(400).send({ error: "Body is not valid JSON" });
    }

    const parsed = PushPayloadSchema.safeParse(json);
    if (!parsed.success) {
      return reply.code(400).send({ error: "Unrecognised push payload" });
    }

    let target: { repo: RepositoryRef; tip: string | null };
    try {
      target = pushTarget(parsed.data);
    } catch (e) {
      return reply.code(400).send({ error: e instanceof Error ? e.message : String(e) });
    }

    const job = deps.coordinator.jobFor(target.repo);
    if (!job) {
      logger.debug("push for untracked repository ignored", { repository: repoKey(target.repo) });
      return reply.code(202).send({ status: "ignored", repository: repoKey(target.repo) });
    }

    if (deps.events) {
      deps.events.notify({ repo: job.repo, tip: target.tip });
      return reply.code(202).send({ status: "accepted", repository: job.key });
    }
    const outcome = deps.coordinator.enqueue(job.repo);
    return reply.code(202).send({ status: "accepted", repository: job.key, outcome });
  });
}
