import { HistoryRecord } from "../types/model/historyRecord.model";

/**
 * Append-only log of calculations for one session.
 * Records keep insertion order and are frozen once appended.
 */
export class HistoryLog {
  private readonly records: HistoryRecord[] = [];

  append(record: HistoryRecord): number {
    this.records.push(Object.freeze({ ...record }));
    return this.records.length;
  }

  get size(): number {
    return this.records.length;
  }

  entries(): readonly HistoryRecord[] {
    return [...this.records];
  }
}
