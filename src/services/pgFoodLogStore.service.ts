import { Pool, PoolConfig } from "pg";
import { FOOD_LOG_SETUP_SQL } from "../configs/database";
import { Nutrient } from "../common/common-enum";
import {
  FoodEntry,
  FoodEntryWithNutrients,
  FoodLogListQuery,
  NewFoodEntry,
} from "../types/model/foodLog.model";
import {
  NUTRIENTS,
  NutrientVector,
  toNutrientVector,
} from "../types/model/nutrient.model";
import { TimeWindow } from "../types/model/summary.model";
import { startOfUtcDay, addCalendarDays } from "../utils/convert";
import { logger } from "../utils/logger";
import { FoodLogStore } from "./foodLogStore.service";

type FoodLogRow = {
  id: number;
  food_name: string;
  quantity: number;
  timestamp: Date;
};

type FoodLogWithNutritionRow = FoodLogRow & Record<Nutrient, number | null>;

const FOOD_LOG_COLUMNS = "f.id, f.food_name, f.quantity, f.timestamp";
const NUTRIENT_COLUMNS = NUTRIENTS.map((nutrient) => `n.${nutrient}`).join(", ");

const toFoodEntry = (row: FoodLogRow): FoodEntry => ({
  id: row.id,
  food_name: row.food_name,
  quantity: row.quantity,
  timestamp: row.timestamp,
});

export class PgFoodLogStore implements FoodLogStore {
  private pool: Pool;

  constructor(config: PoolConfig) {
    this.pool = new Pool({
      ...config,
      max: 10,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    });
  }

  async initialize(): Promise<void> {
    const client = await this.pool.connect();
    try {
      await client.query(FOOD_LOG_SETUP_SQL);
      logger.info("Food log tables ready");
    } catch (error) {
      logger.error("Food log schema setup failed!", error);
      throw error;
    } finally {
      client.release();
    }
  }

  async createEntry(entry: NewFoodEntry): Promise<FoodEntry> {
    const client = await this.pool.connect();
    try {
      const result = await client.query<FoodLogRow>(
        `INSERT INTO food_logs (food_name, quantity, timestamp)
         VALUES ($1, $2, $3)
         RETURNING id, food_name, quantity, timestamp`,
        [entry.food_name, entry.quantity, entry.timestamp]
      );
      return toFoodEntry(result.rows[0]);
    } catch (error) {
      logger.error("insert food log failed!", error);
      throw error;
    } finally {
      client.release();
    }
  }

  async attachNutrients(entryId: number, nutrients: NutrientVector): Promise<void> {
    const placeholders = NUTRIENTS.map((_, index) => `$${index + 2}`).join(", ");
    const client = await this.pool.connect();
    try {
      await client.query(
        `INSERT INTO nutrition (foodlog_id, ${NUTRIENTS.join(", ")})
         VALUES ($1, ${placeholders})`,
        [entryId, ...NUTRIENTS.map((nutrient) => nutrients[nutrient])]
      );
    } catch (error) {
      logger.error(`insert nutrition for food log ${entryId} failed!`, error);
      throw error;
    } finally {
      client.release();
    }
  }

  async listEntries({ skip, limit, date }: FoodLogListQuery): Promise<FoodEntry[]> {
    const params: Array<number | Date> = [];
    let where = "";
    if (date) {
      params.push(startOfUtcDay(date), startOfUtcDay(addCalendarDays(date, 1)));
      where = "WHERE f.timestamp >= $1 AND f.timestamp < $2";
    }
    params.push(skip, limit);

    const client = await this.pool.connect();
    try {
      const result = await client.query<FoodLogRow>(
        `SELECT ${FOOD_LOG_COLUMNS}
         FROM food_logs f
         ${where}
         ORDER BY f.timestamp ASC, f.id ASC
         OFFSET $${params.length - 1} LIMIT $${params.length}`,
        params
      );
      return result.rows.map(toFoodEntry);
    } finally {
      client.release();
    }
  }

  async findEntriesWithNutrients(window: TimeWindow): Promise<FoodEntryWithNutrients[]> {
    const client = await this.pool.connect();
    try {
      const result = await client.query<FoodLogWithNutritionRow>(
        `SELECT ${FOOD_LOG_COLUMNS}, ${NUTRIENT_COLUMNS}
         FROM food_logs f
         JOIN nutrition n ON n.foodlog_id = f.id
         WHERE f.timestamp >= $1 AND f.timestamp < $2
         ORDER BY f.timestamp ASC, f.id ASC`,
        [window.start, window.end]
      );
      return result.rows.map((row) => ({
        ...toFoodEntry(row),
        nutrients: toNutrientVector(row),
      }));
    } finally {
      client.release();
    }
  }

  async ping(): Promise<void> {
    await this.pool.query("SELECT 1");
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
