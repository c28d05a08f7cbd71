import { Request, Response, NextFunction } from "express";
import { ZodTypeAny } from "zod";
import { sendError } from "../utils/response";

type Schemas = {
  body?: ZodTypeAny;
  query?: ZodTypeAny;
  params?: ZodTypeAny;
};

const runSchema = (schema: ZodTypeAny, input: unknown) => {
  const parsed = schema.safeParse(input);
  if (parsed.success) {
    return { data: parsed.data, message: null };
  }
  const message = parsed.error.errors.map((e) => e.message).join(", ");
  return { data: undefined, message };
};

export const validateRequest =
  (schemas: Schemas) => (req: Request, res: Response, next: NextFunction) => {
    if (schemas.body) {
      const { data, message } = runSchema(schemas.body, req.body);
      if (message !== null) return sendError(res, message, 400);
      req.body = data;
    }

    if (schemas.query) {
      const { data, message } = runSchema(schemas.query, req.query);
      if (message !== null) return sendError(res, message, 400);
      req.query = data;
    }

    if (schemas.params) {
      const { data, message } = runSchema(schemas.params, req.params);
      if (message !== null) return sendError(res, message, 400);
      req.params = data;
    }

    return next();
  };
