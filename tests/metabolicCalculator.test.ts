import { describe, expect, it } from "vitest";
import { ActivityLevel, Gender } from "../src/common/common-enum";
import {
  MetabolicCalculatorService,
  describeCalculationError,
} from "../src/services/metabolicCalculator.service";

const calculator = new MetabolicCalculatorService();

describe("MetabolicCalculatorService.calculateBMR", () => {
  it("applies the male Mifflin-St Jeor offset", () => {
    expect(calculator.calculateBMR(Gender.MALE, 70, 175, 30)).toBe(1648.75);
  });

  it("applies the female Mifflin-St Jeor offset", () => {
    expect(calculator.calculateBMR(Gender.FEMALE, 60, 165, 25)).toBe(1345.25);
  });
});

describe("MetabolicCalculatorService.calculateBmrTdee", () => {
  const multipliers: [ActivityLevel, number][] = [
    [ActivityLevel.SEDENTARY, 1.2],
    [ActivityLevel.LIGHTLY_ACTIVE, 1.375],
    [ActivityLevel.MODERATELY_ACTIVE, 1.55],
    [ActivityLevel.VERY_ACTIVE, 1.725],
    [ActivityLevel.EXTREMELY_ACTIVE, 1.9],
  ];

  it.each(multipliers)("scales BMR for %s by %s", (level, multiplier) => {
    expect(calculator.getActivityMultiplier(level)).toBe(multiplier);

    const result = calculator.calculateBmrTdee(70, 175, 30, Gender.MALE, level);
    expect(result).toEqual({
      ok: true,
      value: { bmr: 1648.75, tdee: 1648.75 * multiplier },
    });
  });

  it("reports an unknown activity level as a tagged error", () => {
    const result = calculator.calculateBmrTdee(
      70,
      175,
      30,
      Gender.MALE,
      "Couch Potato"
    );
    expect(result).toEqual({
      ok: false,
      error: { kind: "InvalidActivityLevel", activityLevel: "Couch Potato" },
    });
  });

  it("reports a non-positive BMR instead of returning it", () => {
    // 10*30 + 6.25*50 - 5*91 - 161 = -3.5
    const result = calculator.calculateBmrTdee(
      30,
      50,
      91,
      Gender.FEMALE,
      ActivityLevel.SEDENTARY
    );
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("InvalidResult");
      expect(result.error).toMatchObject({ bmr: -3.5 });
    }
  });
});

describe("describeCalculationError", () => {
  it("renders the activity level into the message", () => {
    expect(
      describeCalculationError({
        kind: "InvalidActivityLevel",
        activityLevel: "Couch Potato",
      })
    ).toBe("Error in calculations: Invalid activity level: Couch Potato");
  });

  it("renders a fixed message for invalid results", () => {
    expect(
      describeCalculationError({ kind: "InvalidResult", bmr: -3.5, tdee: -4.2 })
    ).toBe("Error in calculations: Invalid calculation result");
  });
});
