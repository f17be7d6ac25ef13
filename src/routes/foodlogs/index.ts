import express from "express";
import { FoodLogController } from "../../controllers/foodLog.controller";
import { validateBody, validateQuery } from "../../middlewares/schema-validation.middleware";
import { validateContentType } from "../../middlewares/validation.middleware";
import {
  createFoodLogSchema,
  listFoodLogsQuerySchema,
} from "../../validators/foodLog.validator";

export const createFoodLogRouter = (controller: FoodLogController) => {
  const router = express.Router();

  router.post(
    "/",
    validateContentType,
    validateBody(createFoodLogSchema, controller.createFoodLog)
  );
  router.get("/", validateQuery(listFoodLogsQuerySchema, controller.listFoodLogs));

  return router;
};
