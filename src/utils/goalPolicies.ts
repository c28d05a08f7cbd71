import { Goal } from "../common/common-enum";
import { MacroSplit } from "../types/model/plan.model";
import { FITNESS_CONSTANTS } from "./fitnessConstants";

export interface GoalPolicy {
  targetCalories: (tdee: number) => number;
  // null means narrative only, no "Daily Targets" block
  macroSplit: MacroSplit | null;
  dietFocus: readonly string[];
  exerciseSchedule: readonly string[];
}

export const GOAL_POLICIES: Record<Goal, GoalPolicy> = {
  [Goal.WEIGHT_LOSS]: {
    targetCalories: (tdee) =>
      Math.max(
        FITNESS_CONSTANTS.MIN_DAILY_CALORIES,
        tdee - FITNESS_CONSTANTS.WEIGHT_LOSS_DEFICIT
      ),
    macroSplit: { carbs: 0.4, fats: 0.25 },
    dietFocus: [
      "High protein foods (lean meat, fish, eggs)",
      "Fiber-rich vegetables",
      "Complex carbohydrates",
      "Limited processed foods",
    ],
    exerciseSchedule: [
      "3-4 days of moderate-intensity cardio (30-45 minutes)",
      "2-3 days of strength training",
      "Include rest days for recovery",
    ],
  },
  [Goal.MUSCLE_GAIN]: {
    targetCalories: (tdee) => tdee + FITNESS_CONSTANTS.MUSCLE_GAIN_SURPLUS,
    macroSplit: { carbs: 0.5, fats: 0.25 },
    dietFocus: [
      "High protein foods every 3-4 hours",
      "Complex carbohydrates",
      "Healthy fats",
      "Pre and post-workout nutrition",
    ],
    exerciseSchedule: [
      "4-5 days of strength training",
      "Focus on compound exercises",
      "Progressive overload",
      "1-2 days of light cardio",
      "Proper rest between sessions",
    ],
  },
  [Goal.MAINTENANCE]: {
    targetCalories: (tdee) => tdee,
    macroSplit: { carbs: 0.45, fats: 0.3 },
    dietFocus: [
      "Balanced macro distribution",
      "Whole, unprocessed foods",
      "Regular meal timing",
      "Adequate hydration",
    ],
    exerciseSchedule: [
      "3-4 days of strength training",
      "2-3 days of moderate cardio",
      "Mix of activities for variety",
      "Active recovery days",
    ],
  },
  [Goal.GENERAL_HEALTH]: {
    targetCalories: (tdee) => tdee,
    macroSplit: null,
    dietFocus: [
      "Balanced, nutrient-dense meals",
      "Variety of fruits and vegetables",
      "Whole grains and lean proteins",
      "Mindful eating habits",
    ],
    exerciseSchedule: [
      "Daily physical activity",
      "Mix of cardio and strength training",
      "Focus on enjoyable activities",
      "Stay consistent with routine",
    ],
  },
};
