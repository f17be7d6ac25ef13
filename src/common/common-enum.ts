export enum PeriodKind {
  DAY = "DAY",
  WEEK = "WEEK",
  MONTH = "MONTH",
  YEAR = "YEAR",
}

export enum Nutrient {
  // Macronutrients
  CALORIES = "calories",
  PROTEIN = "protein",
  CARBS = "carbs",
  FAT = "fat",
  SUGARS = "sugars",
  CHOLESTEROL = "cholesterol",

  // Fatty acids
  SAT_FAT = "sat_fat",
  MONO_FAT = "mono_fat",
  POLY_FAT = "poly_fat",
  TRANS_FAT = "trans_fat",

  // Vitamins
  VITAMIN_A = "vitamin_a",
  BETA_CAROTENE = "beta_carotene",
  VITAMIN_B1 = "vitamin_b1",
  VITAMIN_B2 = "vitamin_b2",
  VITAMIN_B3 = "vitamin_b3",
  VITAMIN_B5 = "vitamin_b5",
  VITAMIN_B6 = "vitamin_b6",
  VITAMIN_B9 = "vitamin_b9",
  VITAMIN_B12 = "vitamin_b12",
  VITAMIN_C = "vitamin_c",
  VITAMIN_D = "vitamin_d",
  VITAMIN_E = "vitamin_e",
  VITAMIN_K = "vitamin_k",

  // Minerals
  CALCIUM = "calcium",
  IRON = "iron",
  MAGNESIUM = "magnesium",
  PHOSPHORUS = "phosphorus",
  POTASSIUM = "potassium",
  SODIUM = "sodium",
  ZINC = "zinc",
  COPPER = "copper",
  MANGANESE = "manganese",
  SELENIUM = "selenium",
  CHROMIUM = "chromium",
  MOLYBDENUM = "molybdenum",
  FLUORIDE = "fluoride",
}

export enum StorageDriver {
  POSTGRES = "postgres",
  MEMORY = "memory",
}
