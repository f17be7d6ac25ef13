import express from "express";
import { SummaryController } from "../../controllers/summary.controller";
import { validateQuery } from "../../middlewares/schema-validation.middleware";
import {
  dailySummaryQuerySchema,
  monthlySummaryQuerySchema,
  weeklySummaryQuerySchema,
  yearlySummaryQuerySchema,
} from "../../validators/summary.validator";

export const createSummaryRouter = (controller: SummaryController) => {
  const router = express.Router();

  router.get("/daily", validateQuery(dailySummaryQuerySchema, controller.getDailySummary));
  router.get("/weekly", validateQuery(weeklySummaryQuerySchema, controller.getWeeklySummary));
  router.get(
    "/monthly",
    validateQuery(monthlySummaryQuerySchema, controller.getMonthlySummary)
  );
  router.get("/yearly", validateQuery(yearlySummaryQuerySchema, controller.getYearlySummary));

  return router;
};
