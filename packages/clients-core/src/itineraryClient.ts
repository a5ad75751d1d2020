import { BaseClient, type ClientConfig } from "./baseClient.js";
import type { ItineraryRequest, ItineraryResponse } from "./types.js";

export class ItineraryClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("api/itineraries", config);
  }

  /**
   * Plan an itinerary. Check `generationError` on the response: the
   * ranked places are returned even when no narrative could be written.
   */
  public async plan(request: ItineraryRequest, signal?: AbortSignal): Promise<ItineraryResponse> {
    return this.client.post<ItineraryResponse>({ body: request, signal });
  }
}
