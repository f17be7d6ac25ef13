import { z } from "zod";
import { isIsoDate } from "../utils/convert";

export const isoDateSchema = (field: string) =>
  z
    .string({ required_error: `${field} is required` })
    .trim()
    .refine(isIsoDate, `${field} must be a valid YYYY-MM-DD date`);

export const createFoodLogSchema = z.object({
  food_name: z
    .string({ required_error: "food_name is required" })
    .trim()
    .min(1, "food_name is required")
    .max(200, "food_name must be at most 200 characters"),
  quantity: z
    .number({
      required_error: "quantity is required",
      invalid_type_error: "quantity must be a number",
    })
    .finite("quantity must be finite")
    .positive("quantity must be positive"),
});

export const listFoodLogsQuerySchema = z.object({
  skip: z.coerce
    .number({ invalid_type_error: "skip must be a number" })
    .int("skip must be an integer")
    .min(0, "skip must be >= 0")
    .default(0),
  limit: z.coerce
    .number({ invalid_type_error: "limit must be a number" })
    .int("limit must be an integer")
    .min(1, "limit must be >= 1")
    .max(1000, "limit must be <= 1000")
    .default(100),
  date: isoDateSchema("date").optional(),
});

export type CreateFoodLogBody = z.infer<typeof createFoodLogSchema>;
export type ListFoodLogsQuery = z.infer<typeof listFoodLogsQuerySchema>;
