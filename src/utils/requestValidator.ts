import { NextFunction, Request, Response } from "express";
import { ZodSchema } from "zod";

/** Rejects the request with 400 unless its body matches; otherwise replaces it with the parsed value. */
export const requestValidator =
  (schema: ZodSchema) => (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body ?? {});
    if (!result.success) {
      res.status(400).json({
        Status: false,
        Errors: result.error.flatten().fieldErrors,
      });
      return;
    }
    req.body = result.data;
    next();
  };
