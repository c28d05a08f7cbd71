import { describe, expect, it } from "vitest";
import { SessionStore } from "../src/services/session.service";

describe("SessionStore", () => {
  it("creates a session when no id is given", () => {
    const store = new SessionStore();
    const session = store.resolve();

    expect(session.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(session.history.size).toBe(0);
    expect(store.size).toBe(1);
  });

  it("returns the same session for a known id", () => {
    const store = new SessionStore();
    const session = store.resolve();

    expect(store.resolve(session.id)).toBe(session);
    expect(store.find(session.id)).toBe(session);
    expect(store.size).toBe(1);
  });

  it("issues a fresh id for an unknown one", () => {
    const store = new SessionStore();
    const session = store.resolve("not-a-session");

    expect(session.id).not.toBe("not-a-session");
    expect(store.find("not-a-session")).toBeUndefined();
  });

  it("expires sessions idle longer than the ttl", () => {
    const store = new SessionStore();
    const start = new Date(2024, 0, 1, 12, 0, 0);
    const idle = store.resolve(undefined, start);
    const active = store.resolve(undefined, start);
    store.resolve(active.id, new Date(start.getTime() + 60_000));

    const removed = store.sweepIdle(90_000, new Date(start.getTime() + 120_000));

    expect(removed).toBe(1);
    expect(store.find(idle.id)).toBeUndefined();
    expect(store.find(active.id)).toBe(active);
  });

  it("keeps sessions that are still inside the ttl", () => {
    const store = new SessionStore();
    const start = new Date(2024, 0, 1, 12, 0, 0);
    store.resolve(undefined, start);

    expect(store.sweepIdle(1_000, new Date(start.getTime() + 500))).toBe(0);
    expect(store.size).toBe(1);
  });
});
