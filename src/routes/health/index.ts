import express from "express";
import { HealthController } from "../../controllers/health.controller";

export const createHealthRouter = (controller: HealthController) => {
  const healthRouter = express.Router();

  healthRouter.get("/", controller.checkStorage);
  healthRouter.get("/ollama", controller.checkOllama);

  return healthRouter;
};
