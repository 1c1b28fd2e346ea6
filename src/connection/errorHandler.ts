import { NextFunction, Request, Response } from "express";
import { ZodError } from "zod";
import { SyncValidationError } from "./schemas";
import { logger, LogCategory } from "../utils/smartLogger";

export interface AppError extends Error {
  statusCode?: number;
  code?: string;
  type?: string;
}

/**
 * Maps errors raised at the HTTP boundary onto JSON responses.
 * Nothing here ever reaches the decision engine.
 */
export const errorHandler = (
  error: AppError,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  let statusCode = 500;
  let message = error.message || "Internal Server Error";
  let code = "INTERNAL_ERROR";

  if (error instanceof ZodError) {
    statusCode = 400;
    code = "INVALID_REQUEST";
    const issue = error.issues[0];
    if (issue) {
      message = `${issue.path.join(".") || "body"}: ${issue.message}`;
    }
  } else if (error instanceof SyncValidationError) {
    statusCode = error.statusCode;
    code = error.code;
  } else if (error.type === "entity.parse.failed") {
    // body-parser could not read the JSON
    statusCode = 400;
    code = "INVALID_JSON";
    message = "malformed json body";
  }

  if (statusCode >= 500) {
    logger.error(
      LogCategory.HTTP,
      `Server error on ${req.method} ${req.url}: ${error.message}`,
      error.stack
    );
  } else {
    logger.warn(
      LogCategory.HTTP,
      `Client error on ${req.method} ${req.url} (${statusCode}): ${message}`
    );
  }

  res.status(statusCode).json({ error: message, code });
};
