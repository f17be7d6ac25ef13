import express from "express";
import { FeedbackController } from "../controllers/feedback.controller";
import { FoodLogController } from "../controllers/foodLog.controller";
import { HealthController } from "../controllers/health.controller";
import { SummaryController } from "../controllers/summary.controller";
import { createFeedbackRouter } from "./feedback";
import { createFoodLogRouter } from "./foodlogs";
import { createHealthRouter } from "./health";
import { createSummaryRouter } from "./summaries";

export interface Controllers {
  health: HealthController;
  foodLogs: FoodLogController;
  summaries: SummaryController;
  feedback: FeedbackController;
}

export const createRoutes = (controllers: Controllers) => {
  const router = express.Router();

  router.get("/", (_req, res) => {
    res.json({ success: true, message: "Nutrition Log API" });
  });

  router.use("/health", createHealthRouter(controllers.health));
  router.use("/foodlogs", createFoodLogRouter(controllers.foodLogs));
  router.use("/summaries", createSummaryRouter(controllers.summaries));
  router.use("/feedback", createFeedbackRouter(controllers.feedback));

  return router;
};
