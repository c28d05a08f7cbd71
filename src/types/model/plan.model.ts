import { Goal } from "../../common/common-enum";

export interface MacroGrams {
  protein: number;
  carbs: number;
  fats: number;
}

export interface MacroSplit {
  carbs: number; // fraction of target calories
  fats: number;
}

export interface Plan {
  goal: Goal;
  targetCalories: number;
  macros: MacroGrams | null;
  dietText: string;
  exerciseText: string;
}
