import { Router } from "express";
import { isLoginRejection } from "../../core/brute-force/types";
import { Sentinel } from "../../core/sentinel";
import { CredentialVerifier, HostSessionPlatform } from "../host";
import { sessionGate } from "../middleware/guards";
import { handle, validateBody } from "../middleware/validation";
import { fromExpressRequest, sessionTokenOf } from "../request";
import { LoginSchema } from "./schemas";

export function authRoutes(sentinel: Sentinel, platform: HostSessionPlatform, verifier: CredentialVerifier) {
  const r = Router();
  const { guard, sessions, logger, resolver } = sentinel;

  r.post(
    "/login",
    validateBody(LoginSchema, async ({ username, password }, req, res) => {
      const context = fromExpressRequest(req);

      const gate = await guard.checkLoginAttempt(null, username, password, context);
      if (isLoginRejection(gate)) {
        logger.securityEvent("login_blocked", {
          ip: resolver.resolve(context),
          reason: gate.code,
          username,
        });
        if (gate.retryAfter !== undefined) {
          res.setHeader("Retry-After", String(gate.retryAfter));
        }
        res.status(gate.permanent ? 403 : 429).json({
          ok: false,
          error: { code: gate.code, message: gate.message, retryAfter: gate.retryAfter },
        });
        return;
      }

      const user = await verifier.verify(username, password);
      if (!user) {
        await guard.onLoginFailed(username, context);
        res.status(401).json({
          ok: false,
          error: { code: "invalid_credentials", message: "Invalid username or password" },
        });
        return;
      }

      await guard.onLoginSuccess(username, context);
      const token = platform.createSession(user.id);
      context.userId = user.id;
      context.sessionToken = token;
      const state = await sessions.onLogin(user.id, context, token);

      res.json({ ok: true, userId: user.id, token, loginCount: state.loginCount });
    })
  );

  r.post(
    "/logout",
    sessionGate(platform, sessions),
    handle(async (req, res) => {
      const context = fromExpressRequest(req);
      const token = sessionTokenOf(req);
      if (context.userId) {
        await sessions.onLogout(context.userId);
      }
      if (token) {
        platform.destroySession(token);
      }
      res.json({ ok: true });
    })
  );

  return r;
}
