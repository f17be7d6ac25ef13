import {
  FoodEntry,
  FoodEntryWithNutrients,
  FoodLogListQuery,
  NewFoodEntry,
} from "../types/model/foodLog.model";
import { NutrientVector } from "../types/model/nutrient.model";
import { TimeWindow } from "../types/model/summary.model";

/**
 * Persistence boundary for food log entries and their nutrient vectors.
 *
 * Every method acquires its own connection (or equivalent) and releases it
 * before returning, so callers never hold storage across network calls.
 */
export interface FoodLogStore {
  initialize(): Promise<void>;
  createEntry(entry: NewFoodEntry): Promise<FoodEntry>;
  attachNutrients(entryId: number, nutrients: NutrientVector): Promise<void>;
  listEntries(query: FoodLogListQuery): Promise<FoodEntry[]>;
  /** Entries in `[window.start, window.end)` that have a nutrient vector, oldest first. */
  findEntriesWithNutrients(window: TimeWindow): Promise<FoodEntryWithNutrients[]>;
  ping(): Promise<void>;
  close(): Promise<void>;
}
