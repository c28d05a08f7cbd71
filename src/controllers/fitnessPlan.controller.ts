import { Request, Response } from "express";
import { FitnessPlanRequest } from "../types/request/fitnessPlanRequest";
import { UserProfile } from "../types/model/userProfile.model";
import { fitnessPlanner } from "../services/fitnessPlanner.service";
import { flattenSnapshot } from "../services/recordAssembly.service";
import { sessionStore } from "../services/session.service";
import { logger } from "../utils/logger";
import { NotFoundError } from "../utils/errors";
import {
  sendHttpError,
  sendPlannerError,
  sendSuccess,
} from "../utils/response";

export const SESSION_HEADER = "x-session-id";

const readSessionId = (req: Request): string | undefined => {
  const value = req.header(SESSION_HEADER);
  return value ? value : undefined;
};

class FitnessPlanController {
  createPlan = (req: Request, res: Response) => {
    const body: FitnessPlanRequest = req.body;
    const session = sessionStore.resolve(readSessionId(req));
    res.setHeader(SESSION_HEADER, session.id);

    const profile: UserProfile = Object.freeze({
      name: body.name,
      age: body.age,
      gender: body.gender,
      heightCm: body.heightCm,
      weightKg: body.weightKg,
      activityLevel: body.activityLevel,
      goal: body.goal,
    });

    logger.info(
      `[Controller] - Generating fitness plan for session ${session.id}`
    );
    const result = fitnessPlanner.run(profile, session.history);

    if (!result.ok) {
      return sendPlannerError(res, result.error);
    }

    const outcome = result.value;
    const { sleepHours, mealsPerDay } = body;

    return sendSuccess(
      res,
      "Plan generated successfully! Good luck on your fitness journey!",
      {
        sessionId: session.id,
        greeting: outcome.greeting,
        profile: outcome.profile,
        metabolic: outcome.metabolic,
        plan: outcome.plan,
        summary: outcome.summary,
        schedule: {
          sleepHours,
          mealsPerDay,
          lines: [
            `Recommended sleep: ${sleepHours} hours per night`,
            `Planned meals: ${mealsPerDay} per day`,
          ],
        },
        export: {
          sections: outcome.snapshot,
          rows: flattenSnapshot(outcome.snapshot),
        },
        history: session.history.entries(),
      },
      201
    );
  };

  getHistory = (req: Request, res: Response) => {
    const sessionId = readSessionId(req);
    const session = sessionId ? sessionStore.find(sessionId) : undefined;

    if (!session) {
      return sendHttpError(res, new NotFoundError("Session not found"));
    }

    const history = session.history.entries();
    return sendSuccess(res, `Found ${history.length} previous calculations`, {
      sessionId: session.id,
      history,
    });
  };
}

// Export class instance (Singleton)
export default new FitnessPlanController();
