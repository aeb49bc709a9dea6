import { repoKey, type RepositoryRef } from "../repos/RepositoryRef.js";
import type { Watermark } from "../sync/types.js";

export interface WatermarkStore {
  get(repo: RepositoryRef): Promise<Watermark | null>;
  set(repo: RepositoryRef, watermark: Watermark): Promise<void>;
}

export class MemoryWatermarkStore implements WatermarkStore {
  private readonly marks = new Map<string, Watermark>();

  async get(repo: RepositoryRef): Promise<Watermark | null> {
    return this.marks.get(repoKey(repo)) ?? null;
  }

  async set(repo: RepositoryRef, watermark: Watermark): Promise<void> {
    this.marks.set(repoKey(repo), watermark);
  }
}
