import { Controller, Post, Route, Tags } from "@tsoa/runtime";
import type { ReloadResponse } from "../models/responses.js";
import type { EngineService } from "../services/engine.service.js";

@Route("api/knowledge-base")
@Tags("Knowledge Base")
export class KnowledgeBaseController extends Controller {
  constructor(private readonly engine: EngineService) {
    super();
  }

  /** Re-read the snapshot file and swap the live stores */
  @Post("reload")
  public async reload(): Promise<ReloadResponse> {
    return this.engine.reload();
  }
}
