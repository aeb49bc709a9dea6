export type JobState =
  | "PENDING"
  | "RESOLVING_CREDENTIAL"
  | "SYNCING"
  | "RETRY_SCHEDULED"
  | "AWAITING_REANALYSIS_ACK"
  | "REPORTED"
  | "FAILED";

/**
 * Legal moves between states. FAILED and REPORTED end a pass; REPORTED → PENDING
 * closes the cycle so the same Job serves the repository's next pass.
 */
export const TRANSITIONS: Readonly<Record<JobState, readonly JobState[]>> = {
  PENDING: ["RESOLVING_CREDENTIAL", "REPORTED"],
  RESOLVING_CREDENTIAL: ["SYNCING", "FAILED", "REPORTED"],
  SYNCING: ["AWAITING_REANALYSIS_ACK", "RETRY_SCHEDULED", "FAILED", "REPORTED"],
  RETRY_SCHEDULED: ["RESOLVING_CREDENTIAL", "SYNCING", "FAILED", "REPORTED"],
  AWAITING_REANALYSIS_ACK: ["REPORTED", "FAILED"],
  FAILED: ["REPORTED"],
  REPORTED: ["PENDING"],
};

export const ACTIVE_STATES: ReadonlySet<JobState> = new Set<JobState>([
  "RESOLVING_CREDENTIAL",
  "SYNCING",
  "RETRY_SCHEDULED",
  "AWAITING_REANALYSIS_ACK",
]);

export class InvalidTransitionError extends Error {
  constructor(readonly from: JobState, readonly to: JobState, repository: string) {
    super(`Illegal job transition ${from} → ${to} for ${repository}`);
    this.name = "InvalidTransitionError";
  }
}

export function canTransition(from: JobState, to: JobState): boolean {
  return TRANSITIONS[from].includes(to);
}
