import dayjs from "dayjs";

export const TIMESTAMP_FORMAT = "YYYY-MM-DD HH:mm:ss";

export function formatTimestamp(date: Date): string {
  return dayjs(date).format(TIMESTAMP_FORMAT);
}

/**
 * Rounds to a whole number, sending exact halves to the even neighbour
 * (1630.5 -> 1630, 1631.5 -> 1632).
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const fraction = value - floor;
  if (fraction > 0.5) return floor + 1;
  if (fraction < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

export function formatWhole(value: number): string {
  return roundHalfEven(value).toFixed(0);
}

export function formatKcal(value: number, fractionDigits = 0): string {
  const text =
    fractionDigits === 0 ? formatWhole(value) : value.toFixed(fractionDigits);
  return `${text} kcal/day`;
}
