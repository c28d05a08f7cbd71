import { FITNESS_CONSTANTS } from "../utils/fitnessConstants";

/**
 * Checks raw form fields against the minimum domain bounds.
 * Rules run in order and the first failure is returned.
 */
export function validateInputs(
  name: string,
  age: number,
  heightCm: number,
  weightKg: number
): string | null {
  if (!name.trim()) {
    return "Please enter your name.";
  }
  if (age < FITNESS_CONSTANTS.MIN_AGE) {
    return "Please enter a valid age.";
  }
  if (heightCm < FITNESS_CONSTANTS.MIN_HEIGHT_CM) {
    return `Please enter a valid height (minimum ${FITNESS_CONSTANTS.MIN_HEIGHT_CM} cm).`;
  }
  if (weightKg < FITNESS_CONSTANTS.MIN_WEIGHT_KG) {
    return `Please enter a valid weight (minimum ${FITNESS_CONSTANTS.MIN_WEIGHT_KG} kg).`;
  }
  return null;
}
