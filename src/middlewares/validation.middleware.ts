import { rateLimit } from "express-rate-limit";
import { Request, Response, NextFunction } from "express";
import { AppConfig } from "../configs/environment";
import { sendError } from "../utils/response";

const BODY_METHODS = ["POST", "PUT", "PATCH"];

export const createRateLimiter = (config: AppConfig) =>
  rateLimit({
    windowMs: config.api.rateLimit.windowMs,
    limit: config.api.rateLimit.max,
    message: {
      success: false,
      message: "Rate limit exceeded. Please try again later.",
      error: "Too Many Requests",
    },
    standardHeaders: true,
    legacyHeaders: false,
  });

export const validateContentType = (
  req: Request,
  res: Response,
  next: NextFunction
): void => {
  if (BODY_METHODS.includes(req.method) && !req.is("application/json")) {
    sendError(
      res,
      "Content-Type must be application/json",
      415,
      "Invalid Content-Type"
    );
    return;
  }
  next();
};
