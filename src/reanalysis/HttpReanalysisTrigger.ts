import { fetch, type Dispatcher } from "undici";
import { logger } from "../logger.js";
import { repoKey } from "../repos/RepositoryRef.js";
import type { ReanalysisRequest, ReanalysisTrigger } from "./ReanalysisTrigger.js";

export class ReanalysisRequestError extends Error {
  constructor(readonly status: number, message: string) {
    super(message);
    this.name = "ReanalysisRequestError";
  }
}

export interface HttpReanalysisOptions {
  endpoint: string;
  apiKey?: string;
  dispatcher?: Dispatcher;
}

/** POSTs each request as JSON to the re-analysis service. */
export class HttpReanalysisTrigger implements ReanalysisTrigger {
  protected readonly endpoint: string;
  protected readonly apiKey: string;
  private readonly dispatcher?: Dispatcher;

  constructor(options: HttpReanalysisOptions) {
    this.endpoint = options.endpoint.replace(/\/$/, "");
    this.apiKey = options.apiKey || "";
    this.dispatcher = options.dispatcher;
  }

  async enqueue(request: ReanalysisRequest): Promise<void> {
    const body = {
      repository: repoKey(request.repo),
      commit: request.watermark.commit,
      syncedAt: request.watermark.syncedAt,
      full: request.full,
      changedPaths: request.changedPaths,
    };

    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.apiKey) headers.Authorization = `Bearer ${this.apiKey}`;

    const res = await fetch(this.endpoint, {
      method: "POST",
      headers,
      body: JSON.stringify(body),
      dispatcher: this.dispatcher,
    });

    const text = await res.text();
    if (!res.ok) {
      logger.warn("reanalysis request failed", { url: this.endpoint, status: res.status, response: text.slice(0, 500) });
      throw new ReanalysisRequestError(res.status, `reanalysis endpoint answered ${res.status}`);
    }
    logger.debug("reanalysis request accepted", { repository: body.repository, status: res.status });
  }
}
