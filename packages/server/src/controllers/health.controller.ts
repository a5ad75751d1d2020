import { Controller, Get, Route, Tags } from "@tsoa/runtime";
import type { HealthResponse } from "../models/responses.js";
import type { EngineService } from "../services/engine.service.js";

@Route("health")
@Tags("Health")
export class HealthController extends Controller {
  constructor(private readonly engine: EngineService) {
    super();
  }

  /** Health check with snapshot versions and counts */
  @Get()
  public async getHealth(): Promise<HealthResponse> {
    return this.engine.health();
  }
}
