import { beforeEach, describe, expect, it, vi } from "vitest";
import { NutrientVector, toNutrientVector } from "../types/model/nutrient.model";
import { NotFoundError, NutrientLookupFailedError, UpstreamServiceError } from "../utils/errors";
import { AggregationService } from "./aggregation.service";
import { FoodLogService } from "./foodLog.service";
import { MemoryFoodLogStore } from "./memoryFoodLogStore.service";
import { NutrientResolver } from "./nutrientLookup.service";
import { SummaryService } from "./summary.service";

class FakeResolver implements NutrientResolver {
  constructor(private readonly foods: Record<string, NutrientVector>) {}

  resolve = vi.fn(async (foodName: string) => this.foods[foodName] ?? null);
}

describe("FoodLogService", () => {
  let store: MemoryFoodLogStore;
  let resolver: FakeResolver;
  let now: Date;
  let service: FoodLogService;

  beforeEach(() => {
    store = new MemoryFoodLogStore();
    resolver = new FakeResolver({
      apple: toNutrientVector({ calories: 95, carbs: 25 }),
      banana: toNutrientVector({ calories: 105 }),
    });
    now = new Date("2024-05-20T09:30:00Z");
    service = new FoodLogService(store, resolver, () => now);
  });

  it("stores the entry with the service clock and looks up its nutrients", async () => {
    const entry = await service.createEntry({ food_name: "apple", quantity: 2 });

    expect(entry).toEqual({
      id: 1,
      food_name: "apple",
      quantity: 2,
      timestamp: new Date("2024-05-20T09:30:00Z"),
    });
    expect(resolver.resolve).toHaveBeenCalledWith("apple");
  });

  it("makes created entries visible in the daily summary", async () => {
    await service.createEntry({ food_name: "apple", quantity: 2.0 });
    const summaries = new SummaryService(new AggregationService(store));

    const summary = await summaries.daily("2024-05-20");

    expect(summary.totals.calories).toBe(95);
    expect(summary.top_foods).toEqual([{ food_name: "apple", calories: 95 }]);
  });

  it("fails with a not-found error but keeps the entry when nothing matches", async () => {
    const attempt = service.createEntry({ food_name: "qwerty123", quantity: 1 });

    await expect(attempt).rejects.toBeInstanceOf(NutrientLookupFailedError);
    await expect(attempt).rejects.toBeInstanceOf(NotFoundError);
    await expect(attempt).rejects.toThrow("No nutrition data found for 'qwerty123'");

    const listed = await service.listEntries();
    expect(listed).toEqual([
      {
        id: 1,
        food_name: "qwerty123",
        quantity: 1,
        timestamp: new Date("2024-05-20T09:30:00Z"),
      },
    ]);
  });

  it("propagates lookup transport failures after persisting the entry", async () => {
    resolver.resolve.mockRejectedValueOnce(
      new UpstreamServiceError("FoodData Central", new Error("timeout of 10000ms exceeded"))
    );

    await expect(service.createEntry({ food_name: "apple", quantity: 1 })).rejects.toThrow(
      "FoodData Central request failed: timeout of 10000ms exceeded"
    );
    expect(await service.listEntries()).toHaveLength(1);
  });

  describe("listEntries", () => {
    beforeEach(async () => {
      const times = [
        "2024-05-21T07:00:00Z",
        "2024-05-20T23:59:59Z",
        "2024-05-20T00:00:00Z",
        "2024-05-19T12:00:00Z",
      ];
      for (const time of times) {
        now = new Date(time);
        await service.createEntry({ food_name: "banana", quantity: 1 });
      }
    });

    it("orders entries by timestamp", async () => {
      const entries = await service.listEntries();
      expect(entries.map((entry) => entry.id)).toEqual([4, 3, 2, 1]);
    });

    it("paginates with skip and limit", async () => {
      const entries = await service.listEntries({ skip: 1, limit: 2 });
      expect(entries.map((entry) => entry.id)).toEqual([3, 2]);
    });

    it("filters on a UTC day", async () => {
      const entries = await service.listEntries({ date: "2024-05-20" });
      expect(entries.map((entry) => entry.timestamp.toISOString())).toEqual([
        "2024-05-20T00:00:00.000Z",
        "2024-05-20T23:59:59.000Z",
      ]);
    });
  });
});
