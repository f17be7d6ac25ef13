import express from "express";
import helmet from "helmet";
import cors from "cors";
import compression from "compression";
import { AppConfig } from "./configs/environment";
import { FeedbackController } from "./controllers/feedback.controller";
import { FoodLogController } from "./controllers/foodLog.controller";
import { HealthController } from "./controllers/health.controller";
import { SummaryController } from "./controllers/summary.controller";
import { errorMiddleware, notFoundMiddleware } from "./middlewares/error.middleware";
import { detailedColoredLogger } from "./middlewares/logger.middleware";
import { createRateLimiter } from "./middlewares/validation.middleware";
import { createRoutes } from "./routes";
import { FeedbackGenerator, OllamaHealthService } from "./services/feedback.service";
import { FoodLogService } from "./services/foodLog.service";
import { FoodLogStore } from "./services/foodLogStore.service";
import { SummaryService } from "./services/summary.service";

export interface AppDependencies {
  store: FoodLogStore;
  foodLogService: FoodLogService;
  summaryService: SummaryService;
  feedbackGenerator: FeedbackGenerator;
  ollamaHealth: OllamaHealthService;
}

export const createApp = (deps: AppDependencies, config: AppConfig) => {
  const app = express();

  app.disable("x-powered-by");
  app.use(helmet());
  app.use(cors({ origin: config.api.cors.origin }));
  app.use(compression());
  app.use(express.json({ limit: "1mb" }));
  app.use(createRateLimiter(config.api.rateLimit));
  app.use(detailedColoredLogger);

  app.use(
    "/",
    createRoutes({
      health: new HealthController(deps.store, deps.ollamaHealth),
      foodLogs: new FoodLogController(deps.foodLogService),
      summaries: new SummaryController(deps.summaryService),
      feedback: new FeedbackController(deps.summaryService, deps.feedbackGenerator),
    })
  );

  app.use(notFoundMiddleware);
  // Error middleware should be last
  app.use(errorMiddleware);

  return app;
};
