import "dotenv/config";
import express from "express";
import helmet from "helmet";
import cors from "cors";
import compression from "compression";
import { requestLogger } from "./src/middlewares/logger.middleware";
import { createRateLimiter } from "./src/middlewares/validation.middleware";
import {
  errorMiddleware,
  notFoundMiddleware,
} from "./src/middlewares/error.middleware";
import { loadConfig } from "./src/configs/environment";
import { logger } from "./src/utils/logger";
import { FitnessPlannerApplication } from "./src/main";
import { SESSION_HEADER } from "./src/controllers/fitnessPlan.controller";
import routes from "./src/routes";

export const createApp = () => {
  const config = loadConfig();
  const app = express();

  app.use(helmet());
  app.use(
    cors({ origin: config.api.cors.origin, exposedHeaders: [SESSION_HEADER] })
  );
  app.use(compression());
  app.use(express.json({ limit: "1mb" }));
  app.use(createRateLimiter(config));
  app.use(requestLogger);

  app.use("/", routes);

  app.use(notFoundMiddleware);
  // Error middleware should be last
  app.use(errorMiddleware);

  return app;
};

if (require.main === module) {
  const plannerApp = new FitnessPlannerApplication();
  try {
    plannerApp.initialize();
  } catch (error) {
    logger.error("Failed to initialize application:", error);
    process.exit(1);
  }

  const port = loadConfig().port;
  const server = createApp().listen(port, () =>
    logger.info(`Fitness planner service started on port ${port}`)
  );

  const stop = () => {
    plannerApp.shutdown();
    server.close(() => process.exit(0));
  };
  process.on("SIGINT", stop);
  process.on("SIGTERM", stop);
}
