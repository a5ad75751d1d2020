import { Body, Controller, Post, Request, Route, SuccessResponse, Tags } from "@tsoa/runtime";
import type { Request as ExpressRequest } from "express";
import type { RetrievalResult } from "@transit-vibes/types";
import { abortOnDisconnect } from "../middleware/abort-on-disconnect.js";
import type { SearchRequest } from "../models/requests.js";
import { parseSearchRequest } from "../models/validation.js";
import type { EngineService } from "../services/engine.service.js";

@Route("api/retrieval")
@Tags("Retrieval")
export class RetrievalController extends Controller {
  constructor(private readonly engine: EngineService) {
    super();
  }

  /** Rank POIs and nearby transit for a free-text vibe */
  @Post("search")
  @SuccessResponse(200, "Ranked candidates")
  public async search(
    @Body() body: SearchRequest,
    @Request() req: ExpressRequest,
  ): Promise<RetrievalResult> {
    return this.engine.search(parseSearchRequest(body), abortOnDisconnect(req));
  }
}
