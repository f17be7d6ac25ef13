import { FoodEntry, FoodLogListQuery } from "../types/model/foodLog.model";
import { NutrientLookupFailedError } from "../utils/errors";
import { logger } from "../utils/logger";
import { FoodLogStore } from "./foodLogStore.service";
import { NutrientResolver } from "./nutrientLookup.service";

export interface CreateFoodEntryInput {
  food_name: string;
  quantity: number;
}

export const DEFAULT_PAGE_SIZE = 100;

export class FoodLogService {
  private readonly clock: () => Date;

  constructor(
    private readonly store: FoodLogStore,
    private readonly resolver: NutrientResolver,
    clock?: () => Date
  ) {
    this.clock = clock ?? (() => new Date());
  }

  /**
   * Persist the entry, then look up and attach its nutrients.
   *
   * The entry is written before the lookup and is not removed when the lookup
   * fails, so a failed lookup leaves an entry without nutrients. Such entries
   * show up in listings but never in summaries.
   */
  async createEntry({ food_name, quantity }: CreateFoodEntryInput): Promise<FoodEntry> {
    const entry = await this.store.createEntry({
      food_name,
      quantity,
      timestamp: this.clock(),
    });

    const nutrients = await this.resolver.resolve(food_name);
    if (!nutrients) {
      logger.warn(`Food log ${entry.id} kept without nutrition data ("${food_name}")`);
      throw new NutrientLookupFailedError(food_name);
    }

    await this.store.attachNutrients(entry.id, nutrients);
    logger.info(`Food log ${entry.id} created for "${food_name}"`);
    return entry;
  }

  async listEntries({
    skip = 0,
    limit = DEFAULT_PAGE_SIZE,
    date,
  }: Partial<FoodLogListQuery> = {}): Promise<FoodEntry[]> {
    return this.store.listEntries({ skip, limit, date });
  }
}
