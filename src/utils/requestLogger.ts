import { Request, Response, NextFunction } from "express";
import { createLogger } from "./logger";

const logger = createLogger("http");

export const requestLogger = (
  req: Request,
  res: Response,
  next: NextFunction
) => {
  const { method, originalUrl, body } = req;
  const startedAt = Date.now();

  const entry: Record<string, unknown> = { method, url: originalUrl };

  if (
    ["POST", "PUT", "PATCH", "DELETE"].includes(method.toUpperCase()) &&
    body &&
    typeof body === "object" &&
    Object.keys(body).length
  ) {
    entry.body = body;
  }

  res.on("finish", () => {
    logger.info(
      { ...entry, status: res.statusCode, durationMs: Date.now() - startedAt },
      `${method} ${originalUrl}`
    );
  });

  next();
};
