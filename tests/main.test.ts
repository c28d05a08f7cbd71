import { describe, expect, it } from "vitest";
import { FitnessPlannerApplication } from "../src/main";
import { SessionStore } from "../src/services/session.service";

describe("FitnessPlannerApplication", () => {
  it("expires sessions idle past the configured ttl", () => {
    const sessions = new SessionStore();
    const app = new FitnessPlannerApplication(sessions);
    const start = new Date(2024, 0, 1, 12, 0, 0);
    const stale = sessions.resolve(undefined, start);
    const fresh = sessions.resolve(undefined, new Date(2024, 0, 1, 13, 30, 0));

    // default ttl is 120 minutes
    const removed = app.sweepIdleSessions(new Date(2024, 0, 1, 14, 1, 0));

    expect(removed).toBe(1);
    expect(sessions.find(stale.id)).toBeUndefined();
    expect(sessions.find(fresh.id)).toBe(fresh);
  });

  it("starts and stops the sweep schedule", () => {
    const app = new FitnessPlannerApplication(new SessionStore());

    expect(() => app.initialize()).not.toThrow();
    app.shutdown();
  });
});
