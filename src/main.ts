import { logger } from "./utils/logger";
import { AppConfig, loadConfig, validateConfig } from "./configs/environment";
import { buildDatabaseConfig } from "./configs/database";
import { StorageDriver } from "./common/common-enum";
import { AggregationService } from "./services/aggregation.service";
import {
  FeedbackService,
  NativeOllamaStep,
  OllamaHealthService,
  OpenAICompatibleStep,
} from "./services/feedback.service";
import { FoodLogService } from "./services/foodLog.service";
import { FoodLogStore } from "./services/foodLogStore.service";
import { MemoryFoodLogStore } from "./services/memoryFoodLogStore.service";
import { FdcNutrientResolver } from "./services/nutrientLookup.service";
import { PgFoodLogStore } from "./services/pgFoodLogStore.service";
import { SummaryService } from "./services/summary.service";
import { AppDependencies } from "./server";

export const createStore = (config: AppConfig): FoodLogStore =>
  config.storageDriver === StorageDriver.MEMORY
    ? new MemoryFoodLogStore()
    : new PgFoodLogStore(buildDatabaseConfig(config.database));

/**
 * Wire every collaborator once; services receive them by constructor.
 */
export const createDependencies = (
  config: AppConfig,
  store: FoodLogStore = createStore(config)
): AppDependencies => {
  const aggregation = new AggregationService(store);
  const ollama = { ...config.ollama };

  return {
    store,
    foodLogService: new FoodLogService(store, new FdcNutrientResolver(config.fdc)),
    summaryService: new SummaryService(aggregation, {
      minYear: config.summaries.minYear,
    }),
    feedbackGenerator: new FeedbackService([
      new OpenAICompatibleStep(ollama),
      new NativeOllamaStep(ollama),
    ]),
    ollamaHealth: OllamaHealthService.create(ollama),
  };
};

class NutritionApplication {
  readonly config: AppConfig;
  private deps: AppDependencies | null = null;

  constructor(config: AppConfig = loadConfig()) {
    this.config = config;
  }

  async initialize(): Promise<AppDependencies> {
    logger.info("Starting Nutrition Log service ...");
    // Validate environment upfront
    validateConfig();

    const deps = createDependencies(this.config);
    await deps.store.initialize();
    logger.info(`Storage ready (${this.config.storageDriver})`);

    this.deps = deps;
    return deps;
  }

  async shutdown(): Promise<void> {
    if (!this.deps) return;
    await this.deps.store.close();
    this.deps = null;
    logger.info("Storage connections closed");
  }
}

export { NutritionApplication };
