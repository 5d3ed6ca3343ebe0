/**
 * Reusable Zod validation middleware for Express routes
 */

import type { NextFunction, Request, Response } from "express";
import { ZodError, ZodType, ZodTypeDef } from "zod";

export interface ValidatedLocals<T> {
  validatedBody: T;
}

export interface ValidationErrorBody {
  ok: false;
  error: {
    code: "validation_error";
    message: string;
    details?: Array<{ path: string; message: string; code: string }>;
  };
}

function describeIssues(error: ZodError): NonNullable<ValidationErrorBody["error"]["details"]> {
  return error.errors.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Validate the request body and expose the parsed value as
 * `res.locals.validatedBody`. Schemas are expected to be `.strict()`.
 * Failures answer 400 in the standard error format.
 */
export function validateBody<T>(schema: ZodType<T, ZodTypeDef, unknown>) {
  return (req: Request, res: Response<unknown, ValidatedLocals<T>>, next: NextFunction): void => {
    const result = schema.safeParse(req.body);
    if (!result.success) {
      const body: ValidationErrorBody = {
        ok: false,
        error: {
          code: "validation_error",
          message: "Request validation failed",
          details: describeIssues(result.error),
        },
      };
      res.status(400).json(body);
      return;
    }

    res.locals.validatedBody = result.data;
    next();
  };
}
