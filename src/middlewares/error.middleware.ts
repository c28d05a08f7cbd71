import { Request, Response, NextFunction } from "express";
import { HttpError, NotFoundError } from "../utils/errors";
import { logger } from "../utils/logger";
import { sendError, sendHttpError } from "../utils/response";

export function notFoundMiddleware(
  req: Request,
  _res: Response,
  next: NextFunction
) {
  next(new NotFoundError(`Route ${req.method} ${req.path} not found`));
}

export function errorMiddleware(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
) {
  if (err instanceof HttpError) {
    if (err.status >= 500) logger.error("Request failed", err);
    sendHttpError(res, err);
    return;
  }

  // body-parser attaches a status to malformed JSON errors
  if (err instanceof SyntaxError && "status" in err && err.status === 400) {
    sendError(res, "Malformed JSON body", 400, err.message);
    return;
  }

  logger.error("Unhandled error", err);
  sendError(
    res,
    "Internal Server Error",
    500,
    err instanceof Error ? err.message : undefined
  );
}
