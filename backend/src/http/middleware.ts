import { Request, Response, NextFunction } from "express";
import { HttpError } from "../errors.js";
import { logger } from "../logger.js";

export function requestLoggingMiddleware(
  req: Request,
  _res: Response,
  next: NextFunction,
): void {
  logger.info(
    {
      method: req.method,
      uri: req.originalUrl,
      remoteAddress: req.socket.remoteAddress ?? "unknown",
    },
    "Incoming request",
  );
  next();
}

export function securityHeadersMiddleware(
  _req: Request,
  res: Response,
  next: NextFunction,
): void {
  res.setHeader("X-Content-Type-Options", "nosniff");
  res.setHeader("X-Frame-Options", "DENY");
  res.setHeader("Referrer-Policy", "strict-origin-when-cross-origin");
  next();
}

export function routeNotFoundMiddleware(
  req: Request,
  _res: Response,
  next: NextFunction,
): void {
  next(new HttpError(404, `Route ${req.method} ${req.path} not found`));
}

// body-parser rejects oversized or undecodable payloads with a client status
// attached to the error; only the size limit keeps its own status.
function toClientError(err: unknown): HttpError | null {
  if (err instanceof HttpError) {
    return err;
  }
  if (
    err instanceof Error &&
    "status" in err &&
    typeof err.status === "number" &&
    err.status >= 400 &&
    err.status < 500
  ) {
    if (err.status === 413) {
      return new HttpError(413, "Request body too large");
    }
    // Unsupported charsets and encodings are body problems like any other.
    return new HttpError(400, `Invalid request body: ${err.message}`);
  }
  return null;
}

/**
 * Last stop for anything thrown inside the pipeline. Known client errors keep
 * their status; the rest are logged and answered with a generic 500 so one
 * failing request leaves the others untouched.
 */
export function errorHandlerMiddleware(
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction,
): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  const clientError = toClientError(err);
  if (clientError) {
    logger.debug(
      { status: clientError.status, endpoint: req.path },
      clientError.message,
    );
    res.status(clientError.status).json(clientError.toResponse());
    return;
  }

  logger.error(
    { error: err, method: req.method, endpoint: req.path },
    "Unhandled error while serving request",
  );
  res.status(500).json(new HttpError(500, "Internal server error").toResponse());
}
