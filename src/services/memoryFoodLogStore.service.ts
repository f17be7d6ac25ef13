import {
  FoodEntry,
  FoodEntryWithNutrients,
  FoodLogListQuery,
  NewFoodEntry,
} from "../types/model/foodLog.model";
import { NutrientVector } from "../types/model/nutrient.model";
import { TimeWindow } from "../types/model/summary.model";
import { addCalendarDays, startOfUtcDay } from "../utils/convert";
import { FoodLogStore } from "./foodLogStore.service";

const byTimestampThenId = (a: FoodEntry, b: FoodEntry) =>
  a.timestamp.getTime() - b.timestamp.getTime() || a.id - b.id;

const inWindow = (entry: FoodEntry, start: Date, end: Date) =>
  entry.timestamp.getTime() >= start.getTime() &&
  entry.timestamp.getTime() < end.getTime();

/**
 * Process-local store for development without Postgres (STORAGE_DRIVER=memory).
 * Data lives for the lifetime of the process.
 */
export class MemoryFoodLogStore implements FoodLogStore {
  private entries: FoodEntry[] = [];
  private nutrients = new Map<number, NutrientVector>();
  private nextId = 1;

  async initialize(): Promise<void> {}

  async createEntry(entry: NewFoodEntry): Promise<FoodEntry> {
    const created: FoodEntry = { id: this.nextId++, ...entry };
    this.entries.push(created);
    return { ...created };
  }

  async attachNutrients(entryId: number, nutrients: NutrientVector): Promise<void> {
    if (!this.entries.some((entry) => entry.id === entryId)) {
      throw new Error(`Food log ${entryId} does not exist`);
    }
    if (this.nutrients.has(entryId)) {
      throw new Error(`Food log ${entryId} already has nutrition data`);
    }
    this.nutrients.set(entryId, { ...nutrients });
  }

  async listEntries({ skip, limit, date }: FoodLogListQuery): Promise<FoodEntry[]> {
    const matching = date
      ? this.entries.filter((entry) =>
          inWindow(entry, startOfUtcDay(date), startOfUtcDay(addCalendarDays(date, 1)))
        )
      : this.entries;

    return [...matching]
      .sort(byTimestampThenId)
      .slice(skip, skip + limit)
      .map((entry) => ({ ...entry }));
  }

  async findEntriesWithNutrients(window: TimeWindow): Promise<FoodEntryWithNutrients[]> {
    const rows: FoodEntryWithNutrients[] = [];
    for (const entry of [...this.entries].sort(byTimestampThenId)) {
      const nutrients = this.nutrients.get(entry.id);
      if (nutrients && inWindow(entry, window.start, window.end)) {
        rows.push({ ...entry, nutrients: { ...nutrients } });
      }
    }
    return rows;
  }

  async ping(): Promise<void> {}

  async close(): Promise<void> {}
}
