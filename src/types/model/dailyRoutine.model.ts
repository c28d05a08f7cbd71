export interface DailyRoutine {
  sleepHours: number;
  mealsPerDay: number;
}
