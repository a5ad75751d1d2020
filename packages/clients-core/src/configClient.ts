import { BaseClient, type ClientConfig } from "./baseClient.js";
import type { RetrievalConfig, RetrievalProfileInfo } from "./types.js";

export class ConfigClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("api/config", config);
  }

  /** List all available retrieval profiles */
  public async listProfiles(): Promise<RetrievalProfileInfo[]> {
    return this.client.get<RetrievalProfileInfo[]>({ path: "profiles" });
  }

  /** The server's active retrieval config, or a named profile */
  public async getRetrievalConfig(profile?: string): Promise<RetrievalConfig> {
    return this.client.get<RetrievalConfig>({
      path: "retrieval",
      query: profile ? { profile } : undefined,
    });
  }
}
