import { PoolConfig } from "pg";
import { NUTRIENTS } from "../types/model/nutrient.model";
import { AppConfig } from "./environment";

export const buildDatabaseConfig = (
  database: AppConfig["database"]
): PoolConfig => {
  const ssl = database.ssl ? { rejectUnauthorized: false } : undefined;
  if (database.url) {
    return { connectionString: database.url, ssl };
  }
  return {
    host: database.host,
    port: database.port,
    database: database.name,
    user: database.user,
    password: database.password,
    ssl,
  };
};

const nutrientColumns = NUTRIENTS.map(
  (nutrient) => `    ${nutrient} DOUBLE PRECISION NOT NULL DEFAULT 0`
).join(",\n");

// SQL setup script
export const FOOD_LOG_SETUP_SQL = `
CREATE TABLE IF NOT EXISTS food_logs (
    id SERIAL PRIMARY KEY,
    food_name TEXT NOT NULL,
    quantity DOUBLE PRECISION NOT NULL CHECK (quantity > 0),
    timestamp TIMESTAMPTZ NOT NULL DEFAULT NOW()
);

CREATE INDEX IF NOT EXISTS idx_food_logs_timestamp
ON food_logs(timestamp);

CREATE TABLE IF NOT EXISTS nutrition (
    id SERIAL PRIMARY KEY,
    foodlog_id INTEGER NOT NULL UNIQUE REFERENCES food_logs(id) ON DELETE CASCADE,
${nutrientColumns}
);
`;
