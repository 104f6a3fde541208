/**
 * Zod validation for Express handlers.
 * The handler only runs with a parsed value; failures get the standard
 * `{ok: false, error: {code: "validation_error", ...}}` body.
 */

import { NextFunction, Request, RequestHandler, Response } from "express";
import { ZodError, ZodType, ZodTypeDef } from "zod";
import { SentinelError, toError } from "../../core/errors";

type Parsed<T> = (value: T, req: Request, res: Response) => Promise<void> | void;

export function validationFailure(res: Response, message: string, error: ZodError): void {
  res.status(400).json({
    ok: false,
    error: {
      code: "validation_error",
      message,
      details: error.errors.map((err) => ({
        path: err.path.join("."),
        message: err.message,
        code: err.code,
      })),
    },
  });
}

/**
 * Translate anything a handler throws into the standard error body
 */
export function sendError(res: Response, error: unknown): void {
  if (error instanceof ZodError) {
    validationFailure(res, "Request validation failed", error);
    return;
  }
  if (error instanceof SentinelError) {
    res.status(error.statusCode ?? 500).json({
      ok: false,
      error: { code: error.code.toLowerCase(), message: error.message, details: error.details },
    });
    return;
  }
  res.status(500).json({
    ok: false,
    error: { code: "internal_error", message: toError(error).message || "Internal server error" },
  });
}

function validate<T>(
  pick: (req: Request) => unknown,
  message: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  handler: Parsed<T>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(pick(req));
    if (!result.success) {
      validationFailure(res, message, result.error);
      return;
    }
    Promise.resolve()
      .then(() => handler(result.data, req, res))
      .catch((error: unknown) => {
        if (res.headersSent) {
          next(error);
          return;
        }
        sendError(res, error);
      });
  };
}

export function validateBody<T>(schema: ZodType<T, ZodTypeDef, unknown>, handler: Parsed<T>): RequestHandler {
  return validate((req) => req.body, "Request validation failed", schema, handler);
}

export function validateQuery<T>(schema: ZodType<T, ZodTypeDef, unknown>, handler: Parsed<T>): RequestHandler {
  return validate((req) => req.query, "Query validation failed", schema, handler);
}

export function validateParams<T>(schema: ZodType<T, ZodTypeDef, unknown>, handler: Parsed<T>): RequestHandler {
  return validate((req) => req.params, "Path parameter validation failed", schema, handler);
}

/**
 * Async handler without input validation
 */
export function handle(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch((error: unknown) => {
      if (res.headersSent) {
        next(error);
        return;
      }
      sendError(res, error);
    });
  };
}
