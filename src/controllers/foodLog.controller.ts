import { Request, Response } from "express";
import { FoodLogService } from "../services/foodLog.service";
import { sendSuccess } from "../utils/response";
import { CreateFoodLogBody, ListFoodLogsQuery } from "../validators/foodLog.validator";

export class FoodLogController {
  constructor(private readonly foodLogService: FoodLogService) {}

  createFoodLog = async (body: CreateFoodLogBody, _req: Request, res: Response) => {
    const entry = await this.foodLogService.createEntry(body);
    sendSuccess(res, "Food log created", entry, 201);
  };

  listFoodLogs = async (query: ListFoodLogsQuery, _req: Request, res: Response) => {
    const entries = await this.foodLogService.listEntries(query);
    sendSuccess(res, "Food logs retrieved", entries);
  };
}
