import { NextFunction, Request, Response } from "express";
import { ParseError, UnrecognizedCommandValue } from "../errors";
import { createServiceLogger } from "../logger";

const log = createServiceLogger("api");

export const errorHandler = (err: Error, req: Request, res: Response, next: NextFunction): void => {
  if (res.headersSent) {
    next(err);
    return;
  }

  if (err instanceof ParseError || err instanceof UnrecognizedCommandValue) {
    res.status(400).json({
      success: false,
      error: { code: "BAD_REQUEST", message: err.message },
    });
    return;
  }

  log.error(`❌ ${req.method} ${req.path} failed: ${err.message}`);
  res.status(500).json({
    success: false,
    error: { code: "SERVER_ERROR", message: "Server Error" },
  });
};
