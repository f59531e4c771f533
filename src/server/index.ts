import "dotenv/config";
import { createServer } from "http";
import { loadConfig } from "../shared/config.js";
import { GoogleProvider } from "../shared/llm/index.js";
import { initLogger, logger } from "../shared/logger/index.js";
import { GenerationService } from "../shared/services/generation-service.js";
import { ImageStore } from "../shared/services/image-store.js";
import { RateLimitedCaller } from "../shared/services/rate-limited-caller.js";
import { ReferenceImageLoader } from "../shared/services/reference-image-loader.js";
import { ShotOrchestrator } from "../shared/services/shot-orchestrator.js";
import { createApp } from "./app.js";

initLogger();

(async () => {
  try {
    const config = loadConfig();
    logger.level = config.logLevel;

    const imageStore = new ImageStore(config.staticDir);
    await imageStore.ensureRoot();

    const caller = new RateLimitedCaller(new GoogleProvider(config.apiKey), config.imageModel);
    const generationService = new GenerationService(
      new ShotOrchestrator(caller),
      imageStore,
      new ReferenceImageLoader(),
    );

    const app = createApp({ generationService, imageStore, imageModel: config.imageModel });
    const httpServer = createServer(app);

    httpServer.listen({ port: config.port, host: "0.0.0.0" }, () => {
      console.log(`Serving port ${config.port} (static files in ${config.staticDir})`);
    });
  } catch (error) {
    console.error("[Server] FATAL: Failed to initialize server:", error);
    process.exit(1);
  }
})();
