import { describe, expect, it } from "vitest";
import { Nutrient } from "../common/common-enum";
import { FoodEntryWithNutrients } from "../types/model/foodLog.model";
import { MACRO_NUTRIENTS, toNutrientVector } from "../types/model/nutrient.model";
import {
  AggregationService,
  aggregateNutrients,
  pickMacroTotals,
  rankTopFoods,
} from "./aggregation.service";
import { MemoryFoodLogStore } from "./memoryFoodLogStore.service";

let nextId = 1;
const row = (
  food_name: string,
  nutrients: Partial<Record<Nutrient, number>>,
  timestamp = "2024-05-20T12:00:00Z"
): FoodEntryWithNutrients => ({
  id: nextId++,
  food_name,
  quantity: 1,
  timestamp: new Date(timestamp),
  nutrients: toNutrientVector(nutrients),
});

describe("aggregateNutrients", () => {
  it("sums only the requested fields", () => {
    const rows = [
      row("oats", { calories: 150, protein: 5, carbs: 27, fat: 3, iron: 1.5 }),
      row("milk", { calories: 120, protein: 8, carbs: 12, fat: 5, iron: 0.1 }),
    ];

    const totals = aggregateNutrients(rows, MACRO_NUTRIENTS);

    expect(pickMacroTotals(totals)).toEqual({ calories: 270, protein: 13, carbs: 39, fat: 8 });
    expect(totals[Nutrient.IRON]).toBe(0);
  });

  it("sums every nutrient by default", () => {
    const totals = aggregateNutrients([
      row("spinach", { iron: 2.7, vitamin_k: 483 }),
      row("lentils", { iron: 3.3 }),
    ]);
    expect(totals[Nutrient.IRON]).toBeCloseTo(6, 10);
    expect(totals[Nutrient.VITAMIN_K]).toBe(483);
  });

  it("returns zeros for an empty set", () => {
    expect(pickMacroTotals(aggregateNutrients([], MACRO_NUTRIENTS))).toEqual({
      calories: 0,
      protein: 0,
      carbs: 0,
      fat: 0,
    });
  });
});

describe("rankTopFoods", () => {
  it("groups by name and sorts by summed calories", () => {
    const rows = [
      row("apple", { calories: 95 }),
      row("banana", { calories: 105 }),
      row("apple", { calories: 95 }),
      row("rice", { calories: 150 }),
    ];

    expect(rankTopFoods(rows)).toEqual([
      { food_name: "apple", calories: 190 },
      { food_name: "rice", calories: 150 },
      { food_name: "banana", calories: 105 },
    ]);
  });

  it("keeps at most k foods", () => {
    const rows = ["a", "b", "c", "d", "e"].map((name, i) => row(name, { calories: i * 10 }));
    expect(rankTopFoods(rows).map((food) => food.food_name)).toEqual(["e", "d", "c"]);
    expect(rankTopFoods(rows, 1)).toEqual([{ food_name: "e", calories: 40 }]);
    expect(rankTopFoods(rows, 0)).toEqual([]);
  });

  it("breaks ties by food name ascending regardless of input order", () => {
    const first = [row("pear", { calories: 100 }), row("kiwi", { calories: 100 })];
    const second = [row("kiwi", { calories: 100 }), row("pear", { calories: 100 })];

    const expected = [
      { food_name: "kiwi", calories: 100 },
      { food_name: "pear", calories: 100 },
    ];
    expect(rankTopFoods(first)).toEqual(expected);
    expect(rankTopFoods(second)).toEqual(expected);
  });

  it("treats names case-sensitively", () => {
    const rows = [row("Apple", { calories: 50 }), row("apple", { calories: 60 })];
    expect(rankTopFoods(rows)).toEqual([
      { food_name: "apple", calories: 60 },
      { food_name: "Apple", calories: 50 },
    ]);
  });
});

describe("AggregationService", () => {
  const window = {
    start: new Date("2024-05-20T00:00:00Z"),
    end: new Date("2024-05-21T00:00:00Z"),
  };

  const seed = async (entries: Array<[string, string, number]>) => {
    const store = new MemoryFoodLogStore();
    for (const [food_name, timestamp, calories] of entries) {
      const entry = await store.createEntry({
        food_name,
        quantity: 1,
        timestamp: new Date(timestamp),
      });
      await store.attachNutrients(entry.id, toNutrientVector({ calories }));
    }
    return new AggregationService(store);
  };

  it("includes the start instant and excludes the end instant", async () => {
    const service = await seed([
      ["before", "2024-05-19T23:59:59.999Z", 1],
      ["at-start", "2024-05-20T00:00:00.000Z", 10],
      ["inside", "2024-05-20T18:30:00.000Z", 100],
      ["at-end", "2024-05-21T00:00:00.000Z", 1000],
    ]);

    const totals = await service.aggregate(window, [Nutrient.CALORIES]);
    expect(totals[Nutrient.CALORIES]).toBe(110);
    expect(await service.topFoods(window)).toEqual([
      { food_name: "inside", calories: 100 },
      { food_name: "at-start", calories: 10 },
    ]);
  });

  it("reports an empty window as zero totals and no foods", async () => {
    const service = await seed([]);
    const { totals, topFoods } = await service.summarize(window, MACRO_NUTRIENTS);
    expect(pickMacroTotals(totals)).toEqual({ calories: 0, protein: 0, carbs: 0, fat: 0 });
    expect(topFoods).toEqual([]);
  });
});
