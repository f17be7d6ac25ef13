import express from "express";
import { FeedbackController } from "../../controllers/feedback.controller";
import { validateQuery } from "../../middlewares/schema-validation.middleware";
import { dailySummaryQuerySchema } from "../../validators/summary.validator";

export const createFeedbackRouter = (controller: FeedbackController) => {
  const router = express.Router();

  router.get("/daily", validateQuery(dailySummaryQuerySchema, controller.getDailyFeedback));

  return router;
};
