import { Gender } from "../../common/common-enum";

export interface UserProfile {
  readonly name: string;
  readonly age: number;
  readonly gender: Gender; // Male, Female
  readonly heightCm: number;
  readonly weightKg: number;
  // Narrowed to ActivityLevel by the calculator; unknown values are reported there
  readonly activityLevel: string;
  // Unknown goals fall back to General Health
  readonly goal: string;
}
