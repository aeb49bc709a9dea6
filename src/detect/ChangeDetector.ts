import type { RepositoryRef } from "../repos/RepositoryRef.js";

export interface ChangeDetector {
  readonly name: string;
  /** True when the repository should get a sync pass now. */
  shouldSync(repo: RepositoryRef): Promise<boolean>;
}

/** Asks every detector each time so none of them keeps a stale pending signal. */
export class AnyChangeDetector implements ChangeDetector {
  readonly name: string;

  constructor(private readonly detectors: readonly ChangeDetector[]) {
    this.name = detectors.map((d) => d.name).join("+");
  }

  async shouldSync(repo: RepositoryRef): Promise<boolean> {
    const answers = await Promise.all(this.detectors.map((d) => d.shouldSync(repo)));
    return answers.some(Boolean);
  }
}
