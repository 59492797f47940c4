import express from "express";
import cors from "cors";
import type { SessionRegistry } from "@waymark/navigation";
import { errorHandler } from "./middleware/error-handler.js";
import { registerRoutes } from "./routes.js";
import { GuidanceStreamService } from "./services/guidance-stream.service.js";
import { NavigationService } from "./services/navigation.service.js";

export function createApp(registry: SessionRegistry): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  app.use(
    registerRoutes({
      navigation: new NavigationService(registry),
      stream: new GuidanceStreamService(registry),
    }),
  );

  // Error handler (must be after routes)
  app.use(errorHandler);

  return app;
}
