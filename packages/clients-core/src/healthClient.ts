import { BaseClient, type ClientConfig } from "./baseClient.js";
import type { HealthResponse } from "./types.js";

export class HealthClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("health", config);
  }

  /**
   * Snapshot versions and node, edge and vector counts. `status` is
   * "empty" until the server has loaded a knowledge base.
   */
  public async getHealth(signal?: AbortSignal): Promise<HealthResponse> {
    return this.client.get<HealthResponse>({ signal });
  }

  /** True once a snapshot is loaded and retrieval can serve results */
  public async isReady(signal?: AbortSignal): Promise<boolean> {
    const health = await this.getHealth(signal);
    return health.status === "ok" && health.index.vectors > 0;
  }
}
