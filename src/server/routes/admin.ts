import { Router } from "express";
import { Sentinel } from "../../core/sentinel";
import { handle, validateBody, validateParams, validateQuery } from "../middleware/validation";
import {
  ActionParamsSchema,
  BanRequestSchema,
  EventsQuerySchema,
  IpParamsSchema,
  RateLimitQuerySchema,
  RuleUpdateSchema,
  UserParamsSchema,
} from "./schemas";

export function adminRoutes(sentinel: Sentinel) {
  const r = Router();
  const { guard, rateLimiter, sessions, sink, eventBus } = sentinel;

  r.get(
    "/stats",
    handle(async (_req, res) => {
      res.json({ ok: true, stats: await guard.getSecurityStats() });
    })
  );

  r.get(
    "/bans",
    handle(async (_req, res) => {
      const bans = await guard.listBans();
      res.json({ ok: true, bans: Object.values(bans) });
    })
  );

  r.post(
    "/bans",
    validateBody(BanRequestSchema, async ({ ip, reason, duration }, _req, res) => {
      const result = await guard.manualBanIp(ip, reason, duration);
      if (!result.ok) {
        throw result.error;
      }
      res.status(201).json({ ok: true, ban: result.value });
    })
  );

  r.delete(
    "/bans/:ip",
    validateParams(IpParamsSchema, async ({ ip }, _req, res) => {
      const result = await guard.manualUnbanIp(ip);
      if (!result.ok) {
        throw result.error;
      }
      res.json({ ok: true, ip });
    })
  );

  r.get(
    "/state/:ip",
    validateParams(IpParamsSchema, async ({ ip }, _req, res) => {
      const [state, lockoutCount, failedAttempts] = await Promise.all([
        guard.getState(ip),
        guard.getLockoutCount(ip),
        guard.getFailedAttempts(ip),
      ]);
      res.json({ ok: true, ip, ...state, lockoutCount, failedAttempts });
    })
  );

  r.get("/rules", (_req, res) => {
    res.json({ ok: true, rules: rateLimiter.getRules() });
  });

  r.put(
    "/rules/:action",
    validateBody(RuleUpdateSchema, ({ limit, window }, req, res) => {
      const params = ActionParamsSchema.parse(req.params);
      const rule = rateLimiter.updateRule(params.action, limit, window);
      res.json({ ok: true, action: params.action, rule });
    })
  );

  r.get(
    "/rate-limits/:action",
    validateQuery(RateLimitQuerySchema, async (query, req, res) => {
      const { action } = ActionParamsSchema.parse(req.params);
      const info = await rateLimiter.getRateLimitInfo(action, query);
      if (!info) {
        res.status(404).json({ ok: false, error: { code: "not_found", message: `No rule for action "${action}"` } });
        return;
      }
      res.json({ ok: true, info });
    })
  );

  r.delete(
    "/rate-limits/:action",
    validateQuery(RateLimitQuerySchema, async (query, req, res) => {
      const { action } = ActionParamsSchema.parse(req.params);
      const cleared = await rateLimiter.clearRateLimit(action, query);
      res.json({ ok: true, action, cleared });
    })
  );

  r.get(
    "/events",
    validateQuery(EventsQuerySchema, async ({ type, limit }, _req, res) => {
      const [securityEvents, blockedAttempts] = await Promise.all([
        sink.getSecurityEvents(),
        sink.getBlockedAttempts(),
      ]);
      res.json({
        ok: true,
        securityEvents,
        blockedAttempts,
        recent: eventBus.getHistory({ type, limit }),
      });
    })
  );

  r.get(
    "/sessions/:userId",
    validateParams(UserParamsSchema, async ({ userId }, _req, res) => {
      const [session, loginAttempts, securityEvents] = await Promise.all([
        sessions.getSessionInfo(userId),
        sink.getUserLoginAttempts(userId),
        sink.getUserSecurityEvents(userId),
      ]);
      res.json({ ok: true, userId, session, loginAttempts, securityEvents });
    })
  );

  return r;
}
