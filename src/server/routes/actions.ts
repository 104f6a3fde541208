import { Router } from "express";
import { Sentinel } from "../../core/sentinel";
import { SessionLookup, rateLimit, sessionGate } from "../middleware/guards";
import { validateParams } from "../middleware/validation";
import { ActionParamsSchema } from "./schemas";

/**
 * Generic throttled application actions (message sends, searches, uploads...)
 */
export function actionRoutes(sentinel: Sentinel, platform: SessionLookup) {
  const r = Router();

  r.post(
    "/:action",
    sessionGate(platform, sentinel.sessions),
    rateLimit(sentinel.rateLimiter, (req) => req.params.action),
    validateParams(ActionParamsSchema, ({ action }, _req, res) => {
      res.json({ ok: true, action, throttled: sentinel.rules.has(action) });
    })
  );

  return r;
}
