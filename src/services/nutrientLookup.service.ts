import axios, { AxiosInstance } from "axios";
import { Nutrient } from "../common/common-enum";
import { NutrientVector, toNutrientVector } from "../types/model/nutrient.model";
import { UpstreamServiceError } from "../utils/errors";
import { logger } from "../utils/logger";

export interface NutrientResolver {
  /** Nutrient vector for the best match of `foodName`, or null when nothing matches. */
  resolve(foodName: string): Promise<NutrientVector | null>;
}

// FoodData Central nutrient names -> tracked nutrients
export const FDC_NUTRIENT_NAMES: Readonly<Record<string, Nutrient>> = {
  Energy: Nutrient.CALORIES, // kcal
  Protein: Nutrient.PROTEIN,
  "Carbohydrate, by difference": Nutrient.CARBS,
  "Total lipid (fat)": Nutrient.FAT,
  "Sugars, total": Nutrient.SUGARS,
  Cholesterol: Nutrient.CHOLESTEROL, // mg

  "Fatty acids, total saturated": Nutrient.SAT_FAT,
  "Fatty acids, total monounsaturated": Nutrient.MONO_FAT,
  "Fatty acids, total polyunsaturated": Nutrient.POLY_FAT,
  "Fatty acids, total trans": Nutrient.TRANS_FAT,

  "Vitamin A, RAE": Nutrient.VITAMIN_A, // µg
  "Beta-carotene": Nutrient.BETA_CAROTENE,
  Thiamin: Nutrient.VITAMIN_B1, // mg
  Riboflavin: Nutrient.VITAMIN_B2,
  Niacin: Nutrient.VITAMIN_B3,
  "Pantothenic acid": Nutrient.VITAMIN_B5,
  "Vitamin B-6": Nutrient.VITAMIN_B6,
  "Folate, total": Nutrient.VITAMIN_B9, // µg
  "Vitamin B-12": Nutrient.VITAMIN_B12,
  "Vitamin C, total ascorbic acid": Nutrient.VITAMIN_C, // mg
  "Vitamin D (D2 + D3)": Nutrient.VITAMIN_D, // µg
  "Vitamin E (alpha-tocopherol)": Nutrient.VITAMIN_E, // mg
  "Vitamin K (phylloquinone)": Nutrient.VITAMIN_K, // µg

  "Calcium, Ca": Nutrient.CALCIUM, // mg
  "Iron, Fe": Nutrient.IRON,
  "Magnesium, Mg": Nutrient.MAGNESIUM,
  "Phosphorus, P": Nutrient.PHOSPHORUS,
  "Potassium, K": Nutrient.POTASSIUM,
  "Sodium, Na": Nutrient.SODIUM,
  "Zinc, Zn": Nutrient.ZINC,
  "Copper, Cu": Nutrient.COPPER,
  "Manganese, Mn": Nutrient.MANGANESE,
  "Selenium, Se": Nutrient.SELENIUM, // µg
  "Chromium, Cr": Nutrient.CHROMIUM,
  "Molybdenum, Mo": Nutrient.MOLYBDENUM,
  "Fluoride, F": Nutrient.FLUORIDE, // mg
};

type FdcFoodNutrient = {
  nutrientName?: string;
  unitName?: string;
  value?: number;
  amount?: number;
  nutrient?: { name?: string; unitName?: string };
};

type FdcSearchResponse = {
  foods?: Array<{ fdcId?: number; description?: string }>;
};

type FdcFoodDetail = {
  foodNutrients?: FdcFoodNutrient[];
};

/**
 * Map FDC `foodNutrients` rows onto the tracked nutrients. Unknown names are
 * ignored and energy reported in kJ is skipped so calories stay in kcal.
 */
export function mapFdcNutrients(foodNutrients: readonly FdcFoodNutrient[]): NutrientVector {
  const values: Partial<Record<Nutrient, number>> = {};

  for (const row of foodNutrients) {
    const name = row.nutrientName || row.nutrient?.name;
    const nutrient =
      name && Object.hasOwn(FDC_NUTRIENT_NAMES, name) ? FDC_NUTRIENT_NAMES[name] : undefined;
    if (!nutrient) continue;

    const unit = (row.unitName || row.nutrient?.unitName || "").toLowerCase();
    if (nutrient === Nutrient.CALORIES && unit === "kj") continue;

    values[nutrient] = Number(row.value || row.amount || 0);
  }

  return toNutrientVector(values);
}

export interface FdcClientOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
}

export class FdcNutrientResolver implements NutrientResolver {
  private http: AxiosInstance;
  private apiKey: string;

  constructor(options: FdcClientOptions, http?: AxiosInstance) {
    this.apiKey = options.apiKey;
    this.http =
      http ??
      axios.create({
        baseURL: options.baseUrl,
        timeout: options.timeoutMs,
      });
  }

  async resolve(foodName: string): Promise<NutrientVector | null> {
    try {
      const search = await this.http.get<FdcSearchResponse>("/foods/search", {
        params: { api_key: this.apiKey, query: foodName, pageSize: 1 },
      });
      const food = search.data.foods?.[0];
      if (food?.fdcId === undefined) {
        logger.info(`FDC search found nothing for "${foodName}"`);
        return null;
      }

      const detail = await this.http.get<FdcFoodDetail>(`/food/${food.fdcId}`, {
        params: { api_key: this.apiKey },
      });
      logger.debug(`FDC match for "${foodName}": ${food.description ?? food.fdcId}`);

      return mapFdcNutrients(detail.data.foodNutrients ?? []);
    } catch (error) {
      logger.error(`FDC lookup for "${foodName}" failed:`, error);
      throw new UpstreamServiceError("FoodData Central", error);
    }
  }
}
