import { v4 as uuidv4 } from "uuid";
import { HistoryLog } from "./historyLog";

export interface PlannerSession {
  id: string;
  history: HistoryLog;
  createdAt: Date;
  lastSeenAt: Date;
}

/**
 * In-memory sessions, each owning its own calculation history.
 * Nothing here outlives the process.
 */
export class SessionStore {
  private readonly sessions = new Map<string, PlannerSession>();

  resolve(id?: string, now: Date = new Date()): PlannerSession {
    const existing = id ? this.sessions.get(id) : undefined;
    if (existing) {
      existing.lastSeenAt = now;
      return existing;
    }

    const session: PlannerSession = {
      id: uuidv4(),
      history: new HistoryLog(),
      createdAt: now,
      lastSeenAt: now,
    };
    this.sessions.set(session.id, session);
    return session;
  }

  find(id: string): PlannerSession | undefined {
    return this.sessions.get(id);
  }

  sweepIdle(ttlMs: number, now: Date = new Date()): number {
    let removed = 0;
    for (const [id, session] of this.sessions) {
      if (now.getTime() - session.lastSeenAt.getTime() > ttlMs) {
        this.sessions.delete(id);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.sessions.size;
  }
}

export const sessionStore = new SessionStore();
