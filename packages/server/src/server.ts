import { NotFoundError } from "@transit-vibes/engine";
import { createApp } from "./app.js";
import { loadServerConfig } from "./config/env.js";
import { EngineService } from "./services/engine.service.js";

async function main() {
  const config = loadServerConfig();
  const engine = EngineService.fromConfig(config);

  try {
    await engine.reload();
  } catch (err) {
    if (!(err instanceof NotFoundError)) throw err;
    console.warn(`[server] ${err.message}; starting with an empty knowledge base`);
  }

  const app = createApp(engine);
  app.listen(config.port, () => {
    console.log(`\nTransit Vibes API server running at http://localhost:${config.port}`);
    console.log(`Retrieval profile: ${config.retrievalProfile ?? "base"}\n`);
  });
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
