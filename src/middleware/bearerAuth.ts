/**
 * Bearer Token Middleware
 *
 * Checks `Authorization: Bearer <INBOUND_TOKEN>` on job submission routes.
 * With no token configured every request passes.
 *
 * Usage:
 *   app.post("/infer", createBearerAuth(config.inboundToken, logger), handler);
 */

import { createHash, timingSafeEqual } from "node:crypto";
import type { NextFunction, Request, RequestHandler, Response } from "express";
import type { Logger } from "pino";
import { AuthError } from "../domain/errors";

/**
 * Extract Bearer token from Authorization header.
 * Returns null if header is missing or malformed.
 */
export function extractBearerToken(header: string | undefined): string | null {
  if (!header) return null;

  const parts = header.trim().split(/\s+/);
  if (parts.length !== 2 || parts[0].toLowerCase() !== "bearer") {
    return null;
  }

  return parts[1];
}

// Hash both sides so the comparison does not leak the token length
function tokensMatch(provided: string, expected: string): boolean {
  const a = createHash("sha256").update(provided).digest();
  const b = createHash("sha256").update(expected).digest();
  return timingSafeEqual(a, b);
}

export function createBearerAuth(expectedToken: string, logger: Logger): RequestHandler {
  const log = logger.child({ component: "bearer-auth" });

  return (req: Request, _res: Response, next: NextFunction): void => {
    if (!expectedToken) {
      next();
      return;
    }

    const provided = extractBearerToken(req.headers.authorization);
    if (!provided) {
      log.warn({ path: req.path, method: req.method, ip: req.ip }, "Auth rejected: missing or malformed Authorization header");
      next(new AuthError("Missing or malformed Authorization header. Expected: Bearer <token>"));
      return;
    }

    if (!tokensMatch(provided, expectedToken)) {
      log.warn({ path: req.path, method: req.method, ip: req.ip }, "Auth rejected: invalid token");
      next(new AuthError("Invalid bearer token"));
      return;
    }

    next();
  };
}
