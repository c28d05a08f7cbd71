import { ExportRow, ExportSnapshot } from "../types/model/exportSnapshot.model";
import { HistoryRecord } from "../types/model/historyRecord.model";
import { MetabolicResult } from "../types/model/metabolicResult.model";
import { Plan } from "../types/model/plan.model";
import { UserProfile } from "../types/model/userProfile.model";
import { formatKcal, formatTimestamp } from "../utils/format";

export function assembleRecord(
  profile: UserProfile,
  metabolic: MetabolicResult,
  plan: Plan,
  capturedAt: Date = new Date()
): HistoryRecord {
  return {
    timestamp: formatTimestamp(capturedAt),
    name: profile.name,
    bmr: metabolic.bmr,
    tdee: metabolic.tdee,
    goal: profile.goal,
    calories: plan.targetCalories,
  };
}

/**
 * Flattened view of one calculation for tabular export
 */
export function buildExportSnapshot(
  profile: UserProfile,
  metabolic: MetabolicResult,
  plan: Plan
): ExportSnapshot {
  return {
    "Personal Information": {
      Name: profile.name,
      Age: profile.age,
      Gender: profile.gender,
      "Height (cm)": profile.heightCm,
      "Weight (kg)": profile.weightKg,
      "Activity Level": profile.activityLevel,
      Goal: profile.goal,
    },
    Calculations: {
      BMR: formatKcal(metabolic.bmr, 2),
      TDEE: formatKcal(metabolic.tdee, 2),
      "Target Calories": formatKcal(plan.targetCalories, 2),
    },
    Plans: {
      "Diet Plan": plan.dietText,
      "Exercise Plan": plan.exerciseText,
    },
  };
}

export function flattenSnapshot(snapshot: ExportSnapshot): ExportRow[] {
  const rows: ExportRow[] = [];
  const sections: (keyof ExportSnapshot)[] = [
    "Personal Information",
    "Calculations",
    "Plans",
  ];

  for (const section of sections) {
    const entries = Object.entries<string | number>(snapshot[section]);
    for (const [field, value] of entries) {
      rows.push({ section, field, value });
    }
  }
  return rows;
}
