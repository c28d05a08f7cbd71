import { Gender } from "../../common/common-enum";
import { DailyRoutine } from "../model/dailyRoutine.model";

export interface FitnessPlanRequest extends DailyRoutine {
  name: string;
  age: number;
  gender: Gender;
  heightCm: number;
  weightKg: number;
  activityLevel: string;
  goal: string;
}
