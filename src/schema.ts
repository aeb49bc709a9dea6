import { z } from "zod";
import { CREDENTIAL_METHODS } from "./credentials/CredentialHandle.js";

const protocol = z.enum(["https", "ssh"]);
const credentialMethod = z.enum(CREDENTIAL_METHODS);

export const DiscoverySchema = z.object({
  repo: z.string().min(1),
  protocol: protocol.optional(),
  access_hint: credentialMethod.optional(),
});
export type DiscoveryMsg = z.infer<typeof DiscoverySchema>;

export const RepositoriesFileSchema = z.object({
  repositories: z
    .array(
      z.object({
        url: z.string().min(1),
        protocol: protocol.optional(),
        access: credentialMethod.optional(),
      }),
    )
    .default([]),
});
export type RepositoriesFile = z.infer<typeof RepositoriesFileSchema>;

/** Shape of a GitHub push webhook, reduced to the fields we read. */
export const GitHubPushSchema = z.object({
  after: z.string().optional(),
  repository: z.object({
    full_name: z.string(),
    clone_url: z.string().optional(),
    html_url: z.string().optional(),
  }),
});

export const SimplePushSchema = z.object({
  repo: z.string().min(1),
  tip: z.string().optional(),
});

export const PushPayloadSchema = z.union([GitHubPushSchema, SimplePushSchema]);
export type PushPayload = z.infer<typeof PushPayloadSchema>;

const errorKind = z.enum([
  "NoUsableCredential",
  "AuthError",
  "NetworkError",
  "CorruptWorkspace",
  "DivergedHistory",
  "Aborted",
]);

const jobState = z.enum([
  "PENDING",
  "RESOLVING_CREDENTIAL",
  "SYNCING",
  "RETRY_SCHEDULED",
  "AWAITING_REANALYSIS_ACK",
  "REPORTED",
  "FAILED",
]);

export const WorkflowReportSchema = z.object({
  id: z.string(),
  repository: z.string(),
  host: z.string(),
  owner: z.string(),
  name: z.string(),
  state: z.enum(["REPORTED", "FAILED"]),
  outcome: jobState,
  attempts: z.number().int(),
  durationMs: z.number(),
  changedPathCount: z.number().int(),
  full: z.boolean(),
  watermark: z.string().nullable(),
  errorKind: errorKind.nullable(),
  errorMessage: z.string().nullable(),
  credential: z.object({ tag: credentialMethod, expiresAt: z.string().nullable() }).nullable(),
  reanalysis: z.enum(["queued", "skipped", "failed"]),
  startedAt: z.string(),
  timestamp: z.string(),
});

export const WatermarkSchema = z.object({
  commit: z.string().regex(/^[0-9a-f]{40,64}$/),
  syncedAt: z.string(),
});
