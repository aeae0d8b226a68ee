import type { NextFunction, Request, Response } from "express";
import type { Logger } from "pino";
import { ZodError } from "zod";
import { TokenErrorCode, isTokenError } from "../../../sdk/core/src";

export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = "HttpError";
  }
}

const TOKEN_ERROR_STATUS: Partial<Record<TokenErrorCode, number>> = {
  [TokenErrorCode.Unauthorized]: 403,
  [TokenErrorCode.Paused]: 409,
  [TokenErrorCode.AlreadyPaused]: 409,
  [TokenErrorCode.NotPaused]: 409,
};

/** body-parser's error for a request body that is not valid JSON. */
function isMalformedBody(err: unknown): boolean {
  return err instanceof Error && "type" in err && err.type === "entity.parse.failed";
}

export function errorHandler(logger: Logger) {
  return (err: unknown, _req: Request, res: Response, _next: NextFunction): void => {
    if (isTokenError(err)) {
      res.status(TOKEN_ERROR_STATUS[err.code] ?? 422).json({ error: err.message, code: err.code, number: err.number });
      return;
    }
    if (err instanceof ZodError) {
      const errors = err.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ");
      res.status(400).json({ error: `Validation failed: ${errors}` });
      return;
    }
    if (isMalformedBody(err)) {
      res.status(400).json({ error: "Malformed JSON body" });
      return;
    }
    if (err instanceof HttpError) {
      res.status(err.status).json({ error: err.message });
      return;
    }
    logger.error({ err }, "unhandled request error");
    res.status(500).json({ error: err instanceof Error ? err.message : "Internal error" });
  };
}
