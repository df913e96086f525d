/**
 * Validation Middleware
 *
 * Zod-based validation of route params, forwarded to the error handler as a
 * ValidationError.
 */

import type { Request, Response, NextFunction, RequestHandler } from "express";
import { z, ZodError } from "zod";
import { ValidationError } from "../utils/errorHandler";

export interface ValidationSchemas {
  params?: z.ZodType<Record<string, string>, z.ZodTypeDef, unknown>;
  body?: z.ZodTypeAny;
}

/**
 * @example
 * app.get("/api/analysis/:id",
 *   validate({ params: commonSchemas.analysisId }),
 *   async (req, res) => { ... }
 * );
 */
export function validate(schemas: ValidationSchemas): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    try {
      if (schemas.params) {
        req.params = schemas.params.parse(req.params);
      }
      if (schemas.body) {
        req.body = schemas.body.parse(req.body);
      }
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        const messages = error.errors.map(e => `${e.path.join(".")}: ${e.message}`).join(", ");
        next(new ValidationError(messages));
      } else {
        next(error);
      }
    }
  };
}

export const commonSchemas = {
  analysisId: z.object({
    id: z.string().min(1, "ID is required").max(128),
  }),
  ticker: z.object({
    ticker: z.string().regex(/^[A-Za-z.\-]{1,10}$/, "Ticker must be 1-10 letters"),
  }),
};
