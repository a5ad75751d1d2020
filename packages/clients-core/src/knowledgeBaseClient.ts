import { BaseClient, type ClientConfig } from "./baseClient.js";
import type { ReloadResponse } from "./types.js";

export class KnowledgeBaseClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("api/knowledge-base", config);
  }

  /** Re-read the server's snapshot file and swap it in */
  public async reload(): Promise<ReloadResponse> {
    return this.client.post<ReloadResponse>({ path: "reload" });
  }
}
