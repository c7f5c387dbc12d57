import { NextFunction, Request, Response } from "express";
import { ZodError } from "zod";
import { AppError, ErrorDetails, databaseErrorCode, errorMessage } from "../utils/errors";
import { createLogger } from "../utils/logger";

const logger = createLogger("error-handler");

const UNIQUE_VIOLATION = "23505";
const FOREIGN_KEY_VIOLATION = "23503";
const SERIALIZATION_FAILURE = "40001";
const DEADLOCK_DETECTED = "40P01";

export interface ErrorResponse {
  status: number;
  body: { Status: false; Error?: string; Errors?: ErrorDetails };
}

export function toErrorResponse(err: unknown): ErrorResponse {
  if (err instanceof AppError) {
    return {
      status: err.status,
      body: err.details
        ? { Status: false, Error: err.message, Errors: err.details }
        : { Status: false, Error: err.message },
    };
  }
  if (err instanceof ZodError) {
    return { status: 400, body: { Status: false, Errors: err.flatten().fieldErrors } };
  }
  switch (databaseErrorCode(err)) {
    case UNIQUE_VIOLATION:
      return { status: 409, body: { Status: false, Error: "Resource already exists" } };
    // A row this request refers to was removed by a concurrent request,
    // e.g. the basket was checked out while an item was being added.
    case FOREIGN_KEY_VIOLATION:
      return {
        status: 409,
        body: { Status: false, Error: "Resource was changed by another request, try again" },
      };
    case SERIALIZATION_FAILURE:
    case DEADLOCK_DETECTED:
      return {
        status: 409,
        body: { Status: false, Error: "Concurrent update, try again" },
      };
  }
  return { status: 500, body: { Status: false, Error: "Internal server error" } };
}

export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  // Express recognizes error middleware by its four parameters.
  _next: NextFunction
) => {
  const { status, body } = toErrorResponse(err);
  if (status >= 500) {
    logger.error({ err, url: req.originalUrl }, errorMessage(err));
  }
  res.status(status).json(body);
};
