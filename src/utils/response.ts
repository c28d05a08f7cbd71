import { Response } from "express";
import { PlannerError } from "../services/fitnessPlanner.service";
import { describeCalculationError } from "../services/metabolicCalculator.service";
import { HttpError } from "./errors";

type SuccessPayload<T> = {
  success: true;
  message: string;
  data?: T;
};

type ErrorPayload = {
  success: false;
  message: string;
  error?: string;
};

// Validation blocks the request; calculation failures mean the input was
// well-formed but produced no usable result
const PLANNER_ERROR_STATUS: Record<PlannerError["kind"], number> = {
  ValidationError: 400,
  InvalidActivityLevel: 422,
  InvalidResult: 422,
};

export const sendSuccess = <T>(
  res: Response,
  message: string,
  data?: T,
  status = 200
) => {
  const payload: SuccessPayload<T> = { success: true, message, data };
  return res.status(status).json(payload);
};

export const sendError = (
  res: Response,
  message: string,
  status = 400,
  error?: string
) => {
  const payload: ErrorPayload = { success: false, message, error };
  return res.status(status).json(payload);
};

export const sendPlannerError = (res: Response, error: PlannerError) => {
  const message =
    error.kind === "ValidationError"
      ? error.message
      : describeCalculationError(error);
  return sendError(res, message, PLANNER_ERROR_STATUS[error.kind], error.kind);
};

export const sendHttpError = (res: Response, error: HttpError) =>
  sendError(res, error.message, error.status);
