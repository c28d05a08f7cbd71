import * as cron from "node-cron";
import { logger } from "./utils/logger";
import { loadConfig, validateConfig } from "./configs/environment";
import { SessionStore, sessionStore } from "./services/session.service";

class FitnessPlannerApplication {
  private sweepTask: cron.ScheduledTask | null = null;

  constructor(private readonly sessions: SessionStore = sessionStore) {}

  initialize() {
    logger.info("Starting Fitness Planner ...");
    validateConfig();

    const { ttlMinutes, sweepCron } = loadConfig().session;

    this.sweepTask = cron.schedule(sweepCron, () => {
      this.sweepIdleSessions();
    });

    logger.info(
      `Fitness Planner ready! Sessions expire after ${ttlMinutes} idle minutes`
    );
  }

  sweepIdleSessions(now: Date = new Date()): number {
    const ttlMs = loadConfig().session.ttlMinutes * 60_000;
    const removed = this.sessions.sweepIdle(ttlMs, now);
    if (removed > 0) {
      logger.info(`Cron: expired ${removed} idle sessions`);
    }
    return removed;
  }

  shutdown() {
    this.sweepTask?.stop();
    this.sweepTask = null;
  }
}

export { FitnessPlannerApplication };
