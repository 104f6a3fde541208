/**
 * Express gates in front of application routes
 */

import { NextFunction, Request, RequestHandler, Response } from "express";
import { BruteForceGuard } from "../../core/brute-force/bruteForceGuard";
import { SentinelError } from "../../core/errors";
import { ClientIdentityResolver } from "../../core/identity/clientIdentity";
import { SentinelLogger } from "../../core/logger/logger";
import { RateLimiter } from "../../core/rate-limit/rateLimiter";
import { SessionMonitor } from "../../core/session/sessionMonitor";
import { ADMIN_ROLE, extractToken, verifyToken } from "../auth";
import { fromExpressRequest, sessionTokenOf } from "../request";

export interface SessionLookup {
  lookup(token: string): string | undefined;
}

/**
 * 403 for banned identities, before anything else runs
 */
export function checkIpBan(guard: BruteForceGuard): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    guard
      .checkIpBan(fromExpressRequest(req))
      .then((result) => {
        if (result.blocked) {
          res.status(result.status).json({ ok: false, error: { code: "ip_banned", message: result.message } });
          return;
        }
        next();
      })
      .catch(next);
  };
}

/**
 * Resolves the platform session and runs the integrity checks on it
 */
export function sessionGate(platform: SessionLookup, monitor: SessionMonitor): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const token = sessionTokenOf(req);
    const userId = token ? platform.lookup(token) : undefined;
    if (!token || !userId) {
      res.status(401).json({ ok: false, error: { code: "unauthenticated", message: "Login required" } });
      return;
    }

    const context = fromExpressRequest(req);
    context.userId = userId;
    context.sessionToken = token;

    monitor
      .validateSession(context)
      .then((result) => {
        if (!result.valid) {
          res.status(401).json({
            ok: false,
            error: {
              code: "session_invalid",
              message: "Your session has ended. Please log in again.",
              details: { reason: result.reason, forceLogout: result.forceLogout },
            },
          });
          return;
        }
        next();
      })
      .catch(next);
  };
}

/**
 * Counts the request against `action` and refuses it once the window is full
 */
export function rateLimit(limiter: RateLimiter, action: string | ((req: Request) => string)): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const name = typeof action === "string" ? action : action(req);
    const context = fromExpressRequest(req);
    const rule = limiter.getRule(name);

    limiter
      .applyRateLimit(name, { request: context, userId: context.userId })
      .then((result) => {
        if (rule) {
          res.setHeader("X-RateLimit-Limit", String(rule.limit));
        }
        if (!result.success) {
          res.setHeader("Retry-After", String(result.retryAfter));
          res.setHeader("X-RateLimit-Remaining", "0");
          res.status(429).json({
            ok: false,
            error: { code: "rate_limited", message: result.message, retryAfter: result.retryAfter },
          });
          return;
        }
        if (rule) {
          res.setHeader("X-RateLimit-Remaining", String(result.remainingAttempts));
        }
        next();
      })
      .catch(next);
  };
}

/**
 * Bearer JWT carrying the admin role
 */
export function adminAuth(secret: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const token = extractToken({ authorization: req.headers.authorization });
    if (!token) {
      res.status(401).json({ ok: false, error: { code: "unauthorized", message: "Missing bearer token" } });
      return;
    }
    try {
      const claims = verifyToken(token, secret);
      if (!claims.roles.includes(ADMIN_ROLE)) {
        res.status(403).json({ ok: false, error: { code: "forbidden", message: "Admin role required" } });
        return;
      }
      next();
    } catch (error: unknown) {
      const message = error instanceof SentinelError ? error.message : "Invalid token";
      res.status(401).json({ ok: false, error: { code: "unauthorized", message } });
    }
  };
}

export function requestLogger(logger: SentinelLogger, resolver: ClientIdentityResolver): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const started = Date.now();
    res.on("finish", () => {
      const context = fromExpressRequest(req);
      logger.traceRequest(req.method, req.originalUrl, res.statusCode, Date.now() - started, {
        ip: resolver.resolve(context),
        userId: context.userId,
      });
    });
    next();
  };
}
