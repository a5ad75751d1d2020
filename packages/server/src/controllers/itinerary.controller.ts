import { Body, Controller, Post, Request, Route, SuccessResponse, Tags } from "@tsoa/runtime";
import type { Request as ExpressRequest } from "express";
import { abortOnDisconnect } from "../middleware/abort-on-disconnect.js";
import type { ItineraryRequestBody } from "../models/requests.js";
import type { ItineraryResponse } from "../models/responses.js";
import { parseItineraryRequest } from "../models/validation.js";
import type { EngineService } from "../services/engine.service.js";

@Route("api/itineraries")
@Tags("Itineraries")
export class ItineraryController extends Controller {
  constructor(private readonly engine: EngineService) {
    super();
  }

  /**
   * Retrieve, assemble context and generate a narrative. A failed
   * generation still returns the retrieval result.
   */
  @Post()
  @SuccessResponse(200, "Itinerary planned")
  public async plan(
    @Body() body: ItineraryRequestBody,
    @Request() req: ExpressRequest,
  ): Promise<ItineraryResponse> {
    return this.engine.plan(parseItineraryRequest(body), abortOnDisconnect(req));
  }
}
