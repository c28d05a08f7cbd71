export interface HistoryRecord {
  readonly timestamp: string; // YYYY-MM-DD HH:mm:ss
  readonly name: string;
  readonly bmr: number;
  readonly tdee: number;
  readonly goal: string;
  readonly calories: number;
}
