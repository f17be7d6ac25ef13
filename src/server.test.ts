import { Server } from "node:http";
import axios, { AxiosError, AxiosInstance } from "axios";
import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";
import { buildConfig } from "./configs/environment";
import { createApp } from "./server";
import { AggregationService } from "./services/aggregation.service";
import { OllamaHealthService } from "./services/feedback.service";
import { FoodLogService } from "./services/foodLog.service";
import { MemoryFoodLogStore } from "./services/memoryFoodLogStore.service";
import { NutrientResolver } from "./services/nutrientLookup.service";
import { SummaryService } from "./services/summary.service";
import { toNutrientVector } from "./types/model/nutrient.model";

const resolver: NutrientResolver = {
  resolve: async (foodName) =>
    foodName === "apple"
      ? toNutrientVector({ calories: 95, protein: 0.5, carbs: 25, fat: 0.3 })
      : null,
};

const unreachableOllama = axios.create({
  adapter: async (config) => {
    throw new AxiosError("connect ECONNREFUSED", "ECONNREFUSED", config);
  },
});

describe("HTTP API", () => {
  const generate = vi.fn(async (_prompt: string) => "Add some protein to breakfast.");
  let server: Server;
  let client: AxiosInstance;

  beforeAll(async () => {
    const store = new MemoryFoodLogStore();
    const summaryService = new SummaryService(new AggregationService(store));
    const app = createApp(
      {
        store,
        foodLogService: new FoodLogService(
          store,
          resolver,
          () => new Date("2024-05-20T09:30:00Z")
        ),
        summaryService,
        feedbackGenerator: { generate },
        ollamaHealth: new OllamaHealthService("mistral:latest", unreachableOllama),
      },
      buildConfig({})
    );

    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, () => resolve(listening));
    });
    const address = server.address();
    const port = typeof address === "object" && address ? address.port : 0;
    client = axios.create({
      baseURL: `http://127.0.0.1:${port}`,
      validateStatus: () => true,
    });
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) =>
      server.close((error) => (error ? reject(error) : resolve()))
    );
  });

  it("creates an entry and counts it in the daily summary", async () => {
    const created = await client.post("/foodlogs", { food_name: "apple", quantity: 2 });

    expect(created.status).toBe(201);
    expect(created.data).toEqual({
      success: true,
      message: "Food log created",
      data: {
        id: 1,
        food_name: "apple",
        quantity: 2,
        timestamp: "2024-05-20T09:30:00.000Z",
      },
    });

    const summary = await client.get("/summaries/daily", { params: { date: "2024-05-20" } });
    expect(summary.status).toBe(200);
    expect(summary.data.data).toEqual({
      date: "2024-05-20",
      timezone: "UTC",
      totals: { calories: 95, protein: 0.5, carbs: 25, fat: 0.3 },
      top_foods: [{ food_name: "apple", calories: 95 }],
    });
  });

  it("answers 404 for a food without nutrition data", async () => {
    const response = await client.post("/foodlogs", { food_name: "qwerty123", quantity: 1 });

    expect(response.status).toBe(404);
    expect(response.data).toEqual({
      success: false,
      message: "No nutrition data found for 'qwerty123'",
      error: "NOT_FOUND",
    });
  });

  it("rejects a body without a quantity", async () => {
    const response = await client.post("/foodlogs", { food_name: "apple" });

    expect(response.status).toBe(400);
    expect(response.data.message).toBe("quantity: quantity is required");
    expect(response.data.error).toBe("VALIDATION_ERROR");
  });

  it("rejects malformed JSON", async () => {
    const response = await client.post("/foodlogs", '{"food_name":', {
      headers: { "Content-Type": "application/json" },
    });

    expect(response.status).toBe(400);
    expect(response.data.message).toBe("Malformed JSON body");
  });

  it("rejects a body over the size limit with 413", async () => {
    const response = await client.post("/foodlogs", {
      food_name: "x".repeat(2 * 1024 * 1024),
      quantity: 1,
    });

    expect(response.status).toBe(413);
    expect(response.data).toEqual({
      success: false,
      message: "request entity too large",
      error: "BAD_REQUEST",
    });
  });

  it("rejects an unsupported body charset with 415", async () => {
    const response = await client.post("/foodlogs", '{"food_name":"apple","quantity":1}', {
      headers: { "Content-Type": "application/json; charset=latin-9" },
    });

    expect(response.status).toBe(415);
    expect(response.data.success).toBe(false);
    expect(response.data.error).toBe("BAD_REQUEST");
  });

  it("rejects a month outside 1-12", async () => {
    const response = await client.get("/summaries/monthly", {
      params: { year: 2024, month: 13 },
    });

    expect(response.status).toBe(400);
    expect(response.data.message).toBe("month: month must be between 1 and 12");
  });

  it("rejects an unknown time zone", async () => {
    const response = await client.get("/summaries/daily", {
      params: { date: "2024-05-20", tz: "Not/AZone" },
    });

    expect(response.status).toBe(400);
    expect(response.data).toEqual({
      success: false,
      message: "Unknown IANA time zone 'Not/AZone'",
      error: "INVALID_TIMEZONE",
    });
  });

  it("labels the weekly summary with its last day", async () => {
    const response = await client.get("/summaries/weekly", {
      params: { start_date: "2024-05-20", tz: "America/Chicago" },
    });

    expect(response.status).toBe(200);
    expect(response.data.data.week_start).toBe("2024-05-20");
    expect(response.data.data.week_end).toBe("2024-05-26");
    expect(response.data.data.timezone).toBe("America/Chicago");
  });

  it("builds daily feedback from the day's totals", async () => {
    const response = await client.get("/feedback/daily", { params: { date: "2024-05-20" } });

    expect(response.status).toBe(200);
    expect(response.data.data).toEqual({
      date: "2024-05-20",
      timezone: "UTC",
      tip: "Add some protein to breakfast.",
    });
    expect(generate).toHaveBeenCalledWith(
      "On 2024-05-20 (UTC) I ate 95 kcal, 0.5 g protein, 25 g carbohydrates and 0.3 g fat. " +
        "Give me one short, specific tip to improve tomorrow."
    );
  });

  it("reports storage and model health", async () => {
    const storage = await client.get("/health");
    expect(storage.status).toBe(200);
    expect(storage.data.status).toBe("db ok");

    const ollama = await client.get("/health/ollama");
    expect(ollama.data).toEqual({
      success: false,
      status: "error",
      ollama_running: false,
      error: "connect ECONNREFUSED",
    });
  });

  it("answers unknown routes with 404", async () => {
    const response = await client.get("/nope");

    expect(response.status).toBe(404);
    expect(response.data).toEqual({
      success: false,
      message: "Route GET /nope not found",
      error: "NOT_FOUND",
    });
  });
});
