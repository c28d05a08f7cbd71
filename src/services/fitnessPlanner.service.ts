import { ExportSnapshot } from "../types/model/exportSnapshot.model";
import { HistoryRecord } from "../types/model/historyRecord.model";
import {
  CalculationError,
  MetabolicResult,
} from "../types/model/metabolicResult.model";
import { Plan } from "../types/model/plan.model";
import { UserProfile } from "../types/model/userProfile.model";
import { formatKcal } from "../utils/format";
import { logger } from "../utils/logger";
import { Result, err, ok } from "../utils/result";
import { HistoryLog } from "./historyLog";
import { validateInputs } from "./inputValidator.service";
import {
  MetabolicCalculatorService,
  metabolicCalculator,
} from "./metabolicCalculator.service";
import { PlanGeneratorService, planGenerator } from "./planGenerator.service";
import { assembleRecord, buildExportSnapshot } from "./recordAssembly.service";

export type PlannerError =
  | { kind: "ValidationError"; message: string }
  | CalculationError;

export interface PlannerOutcome {
  profile: UserProfile;
  metabolic: MetabolicResult;
  plan: Plan;
  record: HistoryRecord;
  snapshot: ExportSnapshot;
  greeting: string;
  summary: {
    bmr: string;
    tdee: string;
    targetCalories: string;
  };
}

/**
 * Runs validate -> calculate -> generate -> record for one submission.
 * The history is only touched once every step has succeeded.
 */
export class FitnessPlannerService {
  constructor(
    private readonly calculator: MetabolicCalculatorService = metabolicCalculator,
    private readonly generator: PlanGeneratorService = planGenerator
  ) {}

  run(
    profile: UserProfile,
    history: HistoryLog,
    now: Date = new Date()
  ): Result<PlannerOutcome, PlannerError> {
    const validationError = validateInputs(
      profile.name,
      profile.age,
      profile.heightCm,
      profile.weightKg
    );
    if (validationError) {
      return err({ kind: "ValidationError", message: validationError });
    }

    const metabolic = this.calculator.calculateBmrTdee(
      profile.weightKg,
      profile.heightCm,
      profile.age,
      profile.gender,
      profile.activityLevel
    );
    if (!metabolic.ok) {
      logger.warn(`[Planner] - calculation failed: ${metabolic.error.kind}`);
      return metabolic;
    }

    const { bmr, tdee } = metabolic.value;
    const plan = this.generator.generatePlan(
      profile.goal,
      tdee,
      profile.weightKg
    );

    const record = assembleRecord(profile, metabolic.value, plan, now);
    const count = history.append(record);
    logger.debug(`[Planner] - recorded calculation #${count} for ${profile.name}`);

    return ok({
      profile,
      metabolic: metabolic.value,
      plan,
      record,
      snapshot: buildExportSnapshot(profile, metabolic.value, plan),
      greeting: `Hello, ${profile.name}!`,
      summary: {
        bmr: formatKcal(bmr),
        tdee: formatKcal(tdee),
        targetCalories: formatKcal(plan.targetCalories),
      },
    });
  }
}

export const fitnessPlanner = new FitnessPlannerService();
