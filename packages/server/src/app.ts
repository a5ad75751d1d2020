import express from "express";
import cors from "cors";
import { registerRoutes } from "./routes.js";
import { errorHandler } from "./middleware/error-handler.js";
import type { EngineService } from "./services/engine.service.js";

export function createApp(engine: EngineService): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  registerRoutes(app, engine);

  // Error handler (must be after routes)
  app.use(errorHandler);

  return app;
}
