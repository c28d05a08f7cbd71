import { Goal, isGoal } from "../common/common-enum";
import { MacroGrams, MacroSplit, Plan } from "../types/model/plan.model";
import { FITNESS_CONSTANTS } from "../utils/fitnessConstants";
import { formatWhole } from "../utils/format";
import { GOAL_POLICIES } from "../utils/goalPolicies";

export const UNABLE_DIET_TEXT = "Unable to generate diet plan.";
export const UNABLE_EXERCISE_TEXT = "Unable to generate exercise plan.";

const bulletList = (heading: string, lines: readonly string[]) =>
  [heading, ...lines.map((line) => `- ${line}`)].join("\n");

/**
 * Service that turns a goal, TDEE and body weight into a calorie target,
 * macro split and the goal's diet and exercise narratives.
 */
export class PlanGeneratorService {
  resolveGoal(goal: string): Goal {
    return isGoal(goal) ? goal : Goal.GENERAL_HEALTH;
  }

  calculateMacros(
    calories: number,
    weightKg: number,
    split: MacroSplit
  ): MacroGrams {
    const { KCAL_PER_GRAM, PROTEIN_G_PER_KG } = FITNESS_CONSTANTS;

    return {
      protein: weightKg * PROTEIN_G_PER_KG,
      carbs: (calories * split.carbs) / KCAL_PER_GRAM.carbs,
      fats: (calories * split.fats) / KCAL_PER_GRAM.fats,
    };
  }

  generatePlan(goal: string, tdee: number | null, weightKg: number): Plan {
    const resolved = this.resolveGoal(goal);

    if (tdee === null) {
      return {
        goal: resolved,
        targetCalories: 0,
        macros: null,
        dietText: UNABLE_DIET_TEXT,
        exerciseText: UNABLE_EXERCISE_TEXT,
      };
    }

    const policy = GOAL_POLICIES[resolved];
    const targetCalories = policy.targetCalories(tdee);
    const macros = policy.macroSplit
      ? this.calculateMacros(targetCalories, weightKg, policy.macroSplit)
      : null;

    const focus = bulletList("Focus on:", policy.dietFocus);
    const dietText = macros
      ? `${this.renderDailyTargets(targetCalories, macros)}\n\n${focus}`
      : focus;

    return {
      goal: resolved,
      targetCalories,
      macros,
      dietText,
      exerciseText: bulletList("Weekly Schedule:", policy.exerciseSchedule),
    };
  }

  private renderDailyTargets(calories: number, macros: MacroGrams): string {
    return bulletList("Daily Targets:", [
      `Calories: ${formatWhole(calories)} kcal`,
      `Protein: ${formatWhole(macros.protein)}g`,
      `Carbs: ${formatWhole(macros.carbs)}g`,
      `Fats: ${formatWhole(macros.fats)}g`,
    ]);
  }
}

export const planGenerator = new PlanGeneratorService();
