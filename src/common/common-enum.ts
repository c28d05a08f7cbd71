export enum Gender {
  MALE = "Male",
  FEMALE = "Female",
}

export enum ActivityLevel {
  SEDENTARY = "Sedentary",
  LIGHTLY_ACTIVE = "Lightly Active",
  MODERATELY_ACTIVE = "Moderately Active",
  VERY_ACTIVE = "Very Active",
  EXTREMELY_ACTIVE = "Extremely Active",
}

export enum Goal {
  WEIGHT_LOSS = "Weight Loss",
  MUSCLE_GAIN = "Muscle Gain",
  MAINTENANCE = "Maintenance",
  GENERAL_HEALTH = "General Health",
}

const ACTIVITY_LEVELS: readonly string[] = Object.values(ActivityLevel);
const GOALS: readonly string[] = Object.values(Goal);

export const isActivityLevel = (value: string): value is ActivityLevel =>
  ACTIVITY_LEVELS.includes(value);

export const isGoal = (value: string): value is Goal => GOALS.includes(value);
