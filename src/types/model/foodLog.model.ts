import { NutrientVector } from "./nutrient.model";

export interface FoodEntry {
  id: number;
  food_name: string;
  quantity: number;
  timestamp: Date;
}

export interface NewFoodEntry {
  food_name: string;
  quantity: number;
  timestamp: Date;
}

export interface FoodEntryWithNutrients extends FoodEntry {
  nutrients: NutrientVector;
}

export interface FoodLogListQuery {
  skip: number;
  limit: number;
  // Inclusive start of a UTC day filter, when present
  date?: string;
}
