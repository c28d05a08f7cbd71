import { z } from "zod";
import { Gender } from "../common/common-enum";
import { FITNESS_CONSTANTS, ROUTINE_DEFAULTS } from "../utils/fitnessConstants";

// Lower bounds are left to the input validator so its messages reach the user
export const createFitnessPlanSchema = {
  body: z.object({
    name: z.string({ required_error: "name is required" }),
    age: z
      .number({ required_error: "age is required" })
      .int("age must be a whole number")
      .max(
        FITNESS_CONSTANTS.MAX_AGE,
        `age must be at most ${FITNESS_CONSTANTS.MAX_AGE}`
      ),
    gender: z.nativeEnum(Gender, {
      errorMap: () => ({ message: "gender must be Male or Female" }),
    }),
    heightCm: z
      .number({ required_error: "heightCm is required" })
      .max(
        FITNESS_CONSTANTS.MAX_HEIGHT_CM,
        `heightCm must be at most ${FITNESS_CONSTANTS.MAX_HEIGHT_CM}`
      ),
    weightKg: z
      .number({ required_error: "weightKg is required" })
      .max(
        FITNESS_CONSTANTS.MAX_WEIGHT_KG,
        `weightKg must be at most ${FITNESS_CONSTANTS.MAX_WEIGHT_KG}`
      ),
    activityLevel: z.string({ required_error: "activityLevel is required" }),
    goal: z.string({ required_error: "goal is required" }),
    sleepHours: z
      .number()
      .int("sleepHours must be a whole number")
      .min(ROUTINE_DEFAULTS.MIN_SLEEP_HOURS)
      .max(ROUTINE_DEFAULTS.MAX_SLEEP_HOURS)
      .default(ROUTINE_DEFAULTS.SLEEP_HOURS),
    mealsPerDay: z
      .number()
      .int("mealsPerDay must be a whole number")
      .min(ROUTINE_DEFAULTS.MIN_MEALS_PER_DAY)
      .max(ROUTINE_DEFAULTS.MAX_MEALS_PER_DAY)
      .default(ROUTINE_DEFAULTS.MEALS_PER_DAY),
  }),
};
