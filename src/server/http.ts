import express, { ErrorRequestHandler, NextFunction, Request, Response } from "express";
import cors from "cors";
import bodyParser from "body-parser";
import { Sentinel } from "../core/sentinel";
import { CredentialVerifier, HostSessionPlatform } from "./host";
import { adminAuth, checkIpBan, requestLogger } from "./middleware/guards";
import { sendError } from "./middleware/validation";
import { actionRoutes } from "./routes/actions";
import { adminRoutes } from "./routes/admin";
import { authRoutes } from "./routes/auth";

export interface HttpServerDeps {
  sentinel: Sentinel;
  platform: HostSessionPlatform;
  verifier: CredentialVerifier;
}

export function createHttpServer({ sentinel, platform, verifier }: HttpServerDeps) {
  const app = express();
  const { config, logger } = sentinel;

  // Proxy headers are interpreted by the identity resolver, not by Express
  app.set("trust proxy", false);

  const allowedOrigins = config.allowedOrigins;
  app.use(
    cors({
      origin: (origin, callback) => {
        if (!origin || allowedOrigins.includes(origin)) {
          callback(null, true);
        } else {
          callback(new Error("Not allowed by CORS"));
        }
      },
      credentials: true,
    })
  );

  app.use(bodyParser.json({ limit: "16kb" }));
  app.use(requestLogger(logger, sentinel.resolver));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  // Everything below is refused to banned identities
  app.use(checkIpBan(sentinel.guard));

  app.get("/", (_req, res) => {
    res.json({
      name: config.siteName,
      status: "running",
      endpoints: {
        health: "GET /health",
        login: "POST /auth/login",
        logout: "POST /auth/logout",
        actions: "POST /actions/:action",
        admin: config.jwtSecret ? "/admin" : "disabled (no JWT secret configured)",
      },
    });
  });

  app.use("/auth", authRoutes(sentinel, platform, verifier));
  app.use("/actions", actionRoutes(sentinel, platform));

  if (config.jwtSecret) {
    app.use("/admin", adminAuth(config.jwtSecret), adminRoutes(sentinel));
  } else {
    logger.warn("Admin API disabled: set JWT_SECRET to enable it");
  }

  // 404 handler
  app.use((req: Request, res: Response) => {
    res.status(404).json({
      ok: false,
      error: { code: "not_found", message: `Route ${req.method} ${req.path} not found` },
    });
  });

  const errorHandler: ErrorRequestHandler = (err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ ok: false, error: { code: "invalid_json", message: "Malformed JSON body" } });
      return;
    }
    logger.error(err instanceof Error ? err : new Error(String(err)));
    sendError(res, err);
  };
  app.use(errorHandler);

  return app;
}
