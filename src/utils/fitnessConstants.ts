import { ActivityLevel } from "../common/common-enum";

/**
 * Constants for metabolic calculations and plan generation
 */
export const FITNESS_CONSTANTS = {
  // Minimum accepted inputs
  MIN_AGE: 1,
  MIN_HEIGHT_CM: 50,
  MIN_WEIGHT_KG: 30,

  // Upper bounds of the intake form
  MAX_AGE: 120,
  MAX_HEIGHT_CM: 300,
  MAX_WEIGHT_KG: 200,

  // Mifflin-St Jeor coefficients
  BMR: {
    WEIGHT_FACTOR: 10,
    HEIGHT_FACTOR: 6.25,
    AGE_FACTOR: 5,
    MALE_OFFSET: 5,
    FEMALE_OFFSET: -161,
  },

  // TDEE multipliers by activity level
  ACTIVITY_MULTIPLIERS: {
    [ActivityLevel.SEDENTARY]: 1.2, // little or no exercise
    [ActivityLevel.LIGHTLY_ACTIVE]: 1.375, // light exercise 1-3 days/week
    [ActivityLevel.MODERATELY_ACTIVE]: 1.55, // moderate exercise 3-5 days/week
    [ActivityLevel.VERY_ACTIVE]: 1.725, // heavy exercise 6-7 days/week
    [ActivityLevel.EXTREMELY_ACTIVE]: 1.9, // very heavy exercise, physical job
  },

  PROTEIN_G_PER_KG: 2.2,

  KCAL_PER_GRAM: {
    protein: 4,
    carbs: 4,
    fats: 9,
  },

  WEIGHT_LOSS_DEFICIT: 500,
  MIN_DAILY_CALORIES: 1200,
  MUSCLE_GAIN_SURPLUS: 500,
} as const;

/**
 * Daily routine slider ranges and defaults
 */
export const ROUTINE_DEFAULTS = {
  SLEEP_HOURS: 8,
  MIN_SLEEP_HOURS: 1,
  MAX_SLEEP_HOURS: 12,
  MEALS_PER_DAY: 3,
  MIN_MEALS_PER_DAY: 1,
  MAX_MEALS_PER_DAY: 6,
} as const;
