import { Nutrient } from "../../common/common-enum";

export type NutrientVector = Record<Nutrient, number>;

export const NUTRIENTS: readonly Nutrient[] = Object.values(Nutrient);

export const MACRO_NUTRIENTS = [
  Nutrient.CALORIES,
  Nutrient.PROTEIN,
  Nutrient.CARBS,
  Nutrient.FAT,
] as const;

export type MacroNutrient = (typeof MACRO_NUTRIENTS)[number];

export const createEmptyNutrientVector = (): NutrientVector => ({
  [Nutrient.CALORIES]: 0,
  [Nutrient.PROTEIN]: 0,
  [Nutrient.CARBS]: 0,
  [Nutrient.FAT]: 0,
  [Nutrient.SUGARS]: 0,
  [Nutrient.CHOLESTEROL]: 0,
  [Nutrient.SAT_FAT]: 0,
  [Nutrient.MONO_FAT]: 0,
  [Nutrient.POLY_FAT]: 0,
  [Nutrient.TRANS_FAT]: 0,
  [Nutrient.VITAMIN_A]: 0,
  [Nutrient.BETA_CAROTENE]: 0,
  [Nutrient.VITAMIN_B1]: 0,
  [Nutrient.VITAMIN_B2]: 0,
  [Nutrient.VITAMIN_B3]: 0,
  [Nutrient.VITAMIN_B5]: 0,
  [Nutrient.VITAMIN_B6]: 0,
  [Nutrient.VITAMIN_B9]: 0,
  [Nutrient.VITAMIN_B12]: 0,
  [Nutrient.VITAMIN_C]: 0,
  [Nutrient.VITAMIN_D]: 0,
  [Nutrient.VITAMIN_E]: 0,
  [Nutrient.VITAMIN_K]: 0,
  [Nutrient.CALCIUM]: 0,
  [Nutrient.IRON]: 0,
  [Nutrient.MAGNESIUM]: 0,
  [Nutrient.PHOSPHORUS]: 0,
  [Nutrient.POTASSIUM]: 0,
  [Nutrient.SODIUM]: 0,
  [Nutrient.ZINC]: 0,
  [Nutrient.COPPER]: 0,
  [Nutrient.MANGANESE]: 0,
  [Nutrient.SELENIUM]: 0,
  [Nutrient.CHROMIUM]: 0,
  [Nutrient.MOLYBDENUM]: 0,
  [Nutrient.FLUORIDE]: 0,
});

/**
 * Build a full vector from a partial mapping. Missing, negative and non-finite
 * values are stored as 0, so "unknown" and "zero" read the same downstream.
 */
export const toNutrientVector = (
  values: Partial<Record<Nutrient, number | null>>
): NutrientVector => {
  const vector = createEmptyNutrientVector();
  for (const nutrient of NUTRIENTS) {
    const value = values[nutrient];
    if (typeof value === "number" && Number.isFinite(value) && value > 0) {
      vector[nutrient] = value;
    }
  }
  return vector;
};
