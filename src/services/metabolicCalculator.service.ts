import { ActivityLevel, Gender, isActivityLevel } from "../common/common-enum";
import {
  CalculationError,
  MetabolicResult,
} from "../types/model/metabolicResult.model";
import { FITNESS_CONSTANTS } from "../utils/fitnessConstants";
import { Result, err, ok } from "../utils/result";

/**
 * Service responsible for BMR and TDEE calculations
 */
export class MetabolicCalculatorService {
  /**
   * Calculate BMR using Mifflin-St Jeor equation
   */
  calculateBMR(
    gender: Gender,
    weightKg: number,
    heightCm: number,
    age: number
  ): number {
    const coefficients = FITNESS_CONSTANTS.BMR;
    const base =
      coefficients.WEIGHT_FACTOR * weightKg +
      coefficients.HEIGHT_FACTOR * heightCm -
      coefficients.AGE_FACTOR * age;

    if (gender === Gender.MALE) {
      return base + coefficients.MALE_OFFSET;
    } else {
      return base + coefficients.FEMALE_OFFSET;
    }
  }

  getActivityMultiplier(activityLevel: ActivityLevel): number {
    return FITNESS_CONSTANTS.ACTIVITY_MULTIPLIERS[activityLevel];
  }

  /**
   * Calculate BMR and TDEE. Unknown activity levels and non-positive
   * results come back as a tagged error, never as a partial result.
   */
  calculateBmrTdee(
    weightKg: number,
    heightCm: number,
    age: number,
    gender: Gender,
    activityLevel: string
  ): Result<MetabolicResult, CalculationError> {
    const bmr = this.calculateBMR(gender, weightKg, heightCm, age);

    if (!isActivityLevel(activityLevel)) {
      return err({ kind: "InvalidActivityLevel", activityLevel });
    }

    const tdee = bmr * this.getActivityMultiplier(activityLevel);

    // Only extreme in-range inputs get here (e.g. age 91, 50 cm, 30 kg, female)
    if (bmr <= 0 || tdee <= 0) {
      return err({ kind: "InvalidResult", bmr, tdee });
    }

    return ok({ bmr, tdee });
  }
}

export function describeCalculationError(error: CalculationError): string {
  switch (error.kind) {
    case "InvalidActivityLevel":
      return `Error in calculations: Invalid activity level: ${error.activityLevel}`;
    case "InvalidResult":
      return "Error in calculations: Invalid calculation result";
  }
}

export const metabolicCalculator = new MetabolicCalculatorService();
