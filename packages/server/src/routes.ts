/**
 * Express bindings for the tsoa-decorated controllers.
 *
 * The tsoa decorators only describe the API (they carry no runtime
 * behaviour); the paths below are what Express serves and must be kept
 * in step with `@Route`/`@Get`/`@Post` by hand. Request bodies are
 * checked in `models/validation.ts`, since there is no generated route
 * file to do it.
 *
 * One controller instance per request, so a status set with
 * `setStatus()` never leaks between requests.
 */

import type { Controller } from "@tsoa/runtime";
import type { NextFunction, Request, Response, Router } from "express";
import { ConfigController } from "./controllers/config.controller.js";
import { HealthController } from "./controllers/health.controller.js";
import { ItineraryController } from "./controllers/itinerary.controller.js";
import { KnowledgeBaseController } from "./controllers/knowledge-base.controller.js";
import { RetrievalController } from "./controllers/retrieval.controller.js";
import type { EngineService } from "./services/engine.service.js";

type Action<C extends Controller> = (controller: C, req: Request) => Promise<unknown>;

function bind<C extends Controller>(create: () => C, action: Action<C>) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const controller = create();
    action(controller, req)
      .then((result) => {
        res.status(controller.getStatus() ?? 200).json(result);
      })
      .catch(next);
  };
}

function queryString(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

export function registerRoutes(app: Router, engine: EngineService): void {
  app.get(
    "/health",
    bind(() => new HealthController(engine), (c) => c.getHealth()),
  );
  app.post(
    "/api/retrieval/search",
    bind(() => new RetrievalController(engine), (c, req) => c.search(req.body, req)),
  );
  app.post(
    "/api/itineraries",
    bind(() => new ItineraryController(engine), (c, req) => c.plan(req.body, req)),
  );
  app.post(
    "/api/knowledge-base/reload",
    bind(() => new KnowledgeBaseController(engine), (c) => c.reload()),
  );
  app.get(
    "/api/config/profiles",
    bind(() => new ConfigController(engine), (c) => c.getProfiles()),
  );
  app.get(
    "/api/config/retrieval",
    bind(() => new ConfigController(engine), (c, req) => c.getRetrievalConfig(queryString(req, "profile"))),
  );
}
