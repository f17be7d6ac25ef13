import { Nutrient } from "../common/common-enum";
import { FoodEntryWithNutrients } from "../types/model/foodLog.model";
import {
  NUTRIENTS,
  NutrientVector,
  createEmptyNutrientVector,
} from "../types/model/nutrient.model";
import { MacroTotals, TimeWindow, TopFood } from "../types/model/summary.model";
import { FoodLogStore } from "./foodLogStore.service";

export const DEFAULT_TOP_FOODS = 3;

/**
 * Sum each requested nutrient across rows. Fields that were not requested stay
 * at 0, and an empty input yields 0 everywhere: an empty period is a valid
 * state, not an error.
 */
export function aggregateNutrients(
  rows: readonly FoodEntryWithNutrients[],
  fields: readonly Nutrient[] = NUTRIENTS
): NutrientVector {
  const totals = createEmptyNutrientVector();
  for (const row of rows) {
    for (const field of fields) {
      totals[field] += row.nutrients[field];
    }
  }
  return totals;
}

export const pickMacroTotals = (vector: NutrientVector): MacroTotals => ({
  [Nutrient.CALORIES]: vector[Nutrient.CALORIES],
  [Nutrient.PROTEIN]: vector[Nutrient.PROTEIN],
  [Nutrient.CARBS]: vector[Nutrient.CARBS],
  [Nutrient.FAT]: vector[Nutrient.FAT],
});

/**
 * Group rows by exact food name, sum calories per group and keep the `k`
 * highest. Equal totals are ordered by food name so rankings are reproducible.
 */
export function rankTopFoods(
  rows: readonly FoodEntryWithNutrients[],
  k: number = DEFAULT_TOP_FOODS
): TopFood[] {
  const caloriesByFood = new Map<string, number>();
  for (const row of rows) {
    caloriesByFood.set(
      row.food_name,
      (caloriesByFood.get(row.food_name) ?? 0) + row.nutrients[Nutrient.CALORIES]
    );
  }

  return Array.from(caloriesByFood, ([food_name, calories]) => ({ food_name, calories }))
    .sort((a, b) => {
      if (b.calories !== a.calories) return b.calories - a.calories;
      if (a.food_name < b.food_name) return -1;
      if (a.food_name > b.food_name) return 1;
      return 0;
    })
    .slice(0, Math.max(0, k));
}

export class AggregationService {
  constructor(private readonly store: FoodLogStore) {}

  async aggregate(
    window: TimeWindow,
    fields: readonly Nutrient[] = NUTRIENTS
  ): Promise<NutrientVector> {
    const rows = await this.store.findEntriesWithNutrients(window);
    return aggregateNutrients(rows, fields);
  }

  async topFoods(window: TimeWindow, k: number = DEFAULT_TOP_FOODS): Promise<TopFood[]> {
    const rows = await this.store.findEntriesWithNutrients(window);
    return rankTopFoods(rows, k);
  }

  /** Totals and ranking from a single read of the window. */
  async summarize(
    window: TimeWindow,
    fields: readonly Nutrient[],
    k: number = DEFAULT_TOP_FOODS
  ): Promise<{ totals: NutrientVector; topFoods: TopFood[] }> {
    const rows = await this.store.findEntriesWithNutrients(window);
    return {
      totals: aggregateNutrients(rows, fields),
      topFoods: rankTopFoods(rows, k),
    };
  }
}
