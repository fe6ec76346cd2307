import { NextFunction, Request, Response } from "express";
import createHttpError from "http-errors";
import { ErrorCode, ServiceError } from "../services/errors";

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (err instanceof ServiceError) {
    if (err.code === ErrorCode.UNAUTHENTICATED) {
      res.setHeader("WWW-Authenticate", "Bearer");
    }
    res.status(err.status).json({ error: err.code, message: err.message });
    return;
  }
  // Malformed JSON bodies from body-parser
  if (err instanceof SyntaxError) {
    res.status(400).json({ error: ErrorCode.VALIDATION_ERROR, message: "Malformed JSON body" });
    return;
  }
  // Other client errors from body-parser (413 too large, 415 unsupported encoding, ...)
  if (createHttpError.isHttpError(err) && err.status < 500) {
    res.status(err.status).json({ error: err.name, message: err.message });
    return;
  }
  console.error("Error processing request", err);
  res.status(500).json({ error: "InternalError", message: "Internal Server Error" });
}
