import { NextFunction, Request, Response } from "express";
import { OllamaHealthService } from "../services/feedback.service";
import { FoodLogStore } from "../services/foodLogStore.service";
import { StorageUnavailableError } from "../utils/errors";
import { logger } from "../utils/logger";

export class HealthController {
  constructor(
    private readonly store: FoodLogStore,
    private readonly ollamaHealth: OllamaHealthService
  ) {}

  checkStorage = async (_req: Request, res: Response, next: NextFunction) => {
    try {
      await this.store.ping();
      res.json({
        success: true,
        status: "db ok",
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
      });
    } catch (error) {
      logger.error("Storage health check failed:", error);
      next(new StorageUnavailableError(error));
    }
  };

  checkOllama = async (_req: Request, res: Response) => {
    const status = await this.ollamaHealth.checkConnection();
    res.json({ success: status.status === "healthy", ...status });
  };
}
