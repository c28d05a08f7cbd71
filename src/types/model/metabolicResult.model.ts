export interface MetabolicResult {
  bmr: number; // kcal/day
  tdee: number; // kcal/day
}

export type CalculationError =
  | { kind: "InvalidActivityLevel"; activityLevel: string }
  | { kind: "InvalidResult"; bmr: number; tdee: number };
