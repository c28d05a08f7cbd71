import { describe, expect, it } from "vitest";
import { Gender, Goal } from "../src/common/common-enum";
import { HistoryLog } from "../src/services/historyLog";
import { PlanGeneratorService } from "../src/services/planGenerator.service";
import {
  assembleRecord,
  buildExportSnapshot,
  flattenSnapshot,
} from "../src/services/recordAssembly.service";
import { UserProfile } from "../src/types/model/userProfile.model";

const profile: UserProfile = {
  name: "Jo",
  age: 30,
  gender: Gender.MALE,
  heightCm: 175,
  weightKg: 70,
  activityLevel: "Sedentary",
  goal: Goal.MAINTENANCE,
};
const metabolic = { bmr: 1648.75, tdee: 1978.5 };
const plan = new PlanGeneratorService().generatePlan(Goal.MAINTENANCE, 1978.5, 70);

describe("assembleRecord", () => {
  it("captures the calculation with a formatted timestamp", () => {
    const capturedAt = new Date(2024, 0, 15, 9, 5, 3);

    expect(assembleRecord(profile, metabolic, plan, capturedAt)).toEqual({
      timestamp: "2024-01-15 09:05:03",
      name: "Jo",
      bmr: 1648.75,
      tdee: 1978.5,
      goal: "Maintenance",
      calories: 1978.5,
    });
  });

  it("keeps the goal as submitted", () => {
    const record = assembleRecord(
      { ...profile, goal: "Toning" },
      metabolic,
      plan,
      new Date(2024, 0, 15)
    );
    expect(record.goal).toBe("Toning");
  });
});

describe("HistoryLog", () => {
  const record = (name: string) =>
    assembleRecord({ ...profile, name }, metabolic, plan, new Date(2024, 0, 15));

  it("keeps records in insertion order", () => {
    const log = new HistoryLog();

    expect(log.append(record("first"))).toBe(1);
    expect(log.append(record("second"))).toBe(2);
    expect(log.append(record("third"))).toBe(3);

    expect(log.size).toBe(3);
    expect(log.entries().map((r) => r.name)).toEqual(["first", "second", "third"]);
  });

  it("does not let callers change stored records", () => {
    const log = new HistoryLog();
    const original = {
      timestamp: "2024-01-15 00:00:00",
      name: "first",
      bmr: 1648.75,
      tdee: 1978.5,
      goal: "Maintenance",
      calories: 1978.5,
    };
    log.append(original);
    original.calories = 0;

    const entries = log.entries();
    expect(entries[0].calories).toBe(1978.5);
    expect(Object.isFrozen(entries[0])).toBe(true);
  });

  it("hands out a copy of the sequence", () => {
    const log = new HistoryLog();
    log.append(record("first"));

    const entries = [...log.entries()];
    entries.pop();

    expect(log.size).toBe(1);
    expect(log.entries()).toHaveLength(1);
  });
});

describe("buildExportSnapshot", () => {
  it("groups personal info, calculations and plan text", () => {
    expect(buildExportSnapshot(profile, metabolic, plan)).toEqual({
      "Personal Information": {
        Name: "Jo",
        Age: 30,
        Gender: "Male",
        "Height (cm)": 175,
        "Weight (kg)": 70,
        "Activity Level": "Sedentary",
        Goal: "Maintenance",
      },
      Calculations: {
        BMR: "1648.75 kcal/day",
        TDEE: "1978.50 kcal/day",
        "Target Calories": "1978.50 kcal/day",
      },
      Plans: {
        "Diet Plan": plan.dietText,
        "Exercise Plan": plan.exerciseText,
      },
    });
  });
});

describe("flattenSnapshot", () => {
  it("emits one row per field in section order", () => {
    const rows = flattenSnapshot(buildExportSnapshot(profile, metabolic, plan));

    expect(rows).toHaveLength(12);
    expect(rows[0]).toEqual({
      section: "Personal Information",
      field: "Name",
      value: "Jo",
    });
    expect(rows[7]).toEqual({
      section: "Calculations",
      field: "BMR",
      value: "1648.75 kcal/day",
    });
    expect(rows[11]).toEqual({
      section: "Plans",
      field: "Exercise Plan",
      value: plan.exerciseText,
    });
  });
});
