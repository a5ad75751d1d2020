import { BaseClient, type ClientConfig } from "./baseClient.js";
import type { RetrievalResult, SearchRequest } from "./types.js";

export class RetrievalClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("api/retrieval", config);
  }

  /** Rank POIs and nearby transit for a free-text vibe */
  public async search(request: SearchRequest, signal?: AbortSignal): Promise<RetrievalResult> {
    return this.client.post<RetrievalResult>({ path: "search", body: request, signal });
  }
}
