import { Controller, Get, Query, Route, Tags } from "@tsoa/runtime";
import type { RetrievalConfig } from "@transit-vibes/types";
import type { ProfileListItem } from "../models/responses.js";
import type { EngineService } from "../services/engine.service.js";

@Route("api/config")
@Tags("Config")
export class ConfigController extends Controller {
  constructor(private readonly engine: EngineService) {
    super();
  }

  /** List all available retrieval profiles */
  @Get("profiles")
  public async getProfiles(): Promise<ProfileListItem[]> {
    return this.engine.listProfiles();
  }

  /** The active retrieval config, or a named profile resolved over base */
  @Get("retrieval")
  public async getRetrievalConfig(@Query() profile?: string): Promise<RetrievalConfig> {
    return this.engine.getRetrievalConfig(profile);
  }
}
