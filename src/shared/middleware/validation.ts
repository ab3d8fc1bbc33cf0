import { Request, Response, NextFunction, RequestHandler } from "express";
import { ZodSchema } from "zod";
import { ValidationError } from "../errors/DomainErrors";

/**
 * Validate `{ body, params, query }` against a zod schema. Failures go to
 * the error handler as a ValidationError listing every issue.
 */
export const validateRequest = (schema: ZodSchema): RequestHandler => {
  return (req: Request, _res: Response, next: NextFunction) => {
    const result = schema.safeParse({
      body: req.body,
      params: req.params,
      query: req.query,
    });
    if (!result.success) {
      next(
        new ValidationError("Validation failed", {
          issues: result.error.issues.map((issue) => ({
            path: issue.path.join("."),
            message: issue.message,
          })),
        }),
      );
      return;
    }
    next();
  };
};

/**
 * Forward a rejected handler promise to the error handler.
 */
export const asyncHandler = (
  handler: (req: Request, res: Response, next: NextFunction) => Promise<void>,
): RequestHandler => {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
};
