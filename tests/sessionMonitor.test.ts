/**
 * Session Integrity Monitor Tests
 */

import { generateSessionToken } from "../src/core/session/sessionMonitor";
import { createHarness, flushAsync, request } from "./helpers";

const HOME_IP = "203.0.113.5";
const BROWSER = "Browser/1.0";

describe("SessionMonitor", () => {
  let h: ReturnType<typeof createHarness>;
  const userRequest = (ip = HOME_IP, ua = BROWSER) => request(ip, ua, { userId: "42" });

  beforeEach(() => {
    h = createHarness({ users: { "42": { displayName: "Alice", email: "alice@example.test" } } });
  });

  describe("login", () => {
    test("creates the session state and trims other sessions", async () => {
      const state = await h.monitor.onLogin("42", userRequest(), "platform-token");

      expect(state.userId).toBe("42");
      expect(state.loginTime).toBe(h.clock.now());
      expect(state.lastActivity).toBe(h.clock.now());
      expect(state.ipAddress).toBe(HOME_IP);
      expect(state.userAgent).toBe(BROWSER);
      expect(state.sessionToken).toMatch(/^[A-Za-z0-9]{32}$/);
      expect(state.loginCount).toBe(1);
      expect(h.platform.destroyedOthers).toEqual([{ userId: "42", currentToken: "platform-token" }]);

      const attempts = await h.sink.getUserLoginAttempts("42");
      expect(attempts).toEqual([
        { userId: "42", ipAddress: HOME_IP, userAgent: BROWSER, timestamp: h.clock.now(), success: true },
      ]);
    });

    test("counts logins across sessions", async () => {
      await h.monitor.onLogin("42", userRequest());
      const second = await h.monitor.onLogin("42", userRequest());

      expect(second.loginCount).toBe(2);
      expect(await h.durable.getUserField("42", "_login_count")).toBe(2);
    });

    test("falls back to the request's own token", async () => {
      await h.monitor.onLogin("42", request(HOME_IP, BROWSER, { userId: "42", sessionToken: "from-request" }));
      expect(h.platform.destroyedOthers[0].currentToken).toBe("from-request");
    });
  });

  describe("validation", () => {
    test("anonymous requests are always valid", async () => {
      expect(await h.monitor.validateSession(request(HOME_IP))).toEqual({ valid: true });
    });

    test("an untracked session is left to the platform", async () => {
      expect(await h.monitor.validateSession(userRequest())).toEqual({ valid: true });
    });

    test("a valid request refreshes the activity stamp", async () => {
      await h.monitor.onLogin("42", userRequest());
      h.clock.advance(100);

      expect(await h.monitor.validateSession(userRequest())).toEqual({ valid: true });

      const info = await h.monitor.getSessionInfo("42");
      expect(info).toEqual({
        loginTime: 1_700_000_000,
        lastActivity: 1_700_000_100,
        ipAddress: HOME_IP,
        sessionAge: 100,
        timeSinceActivity: 0,
        isExpired: false,
      });
      expect(await h.durable.getUserField("42", "last_activity")).toBe("2023-11-14 22:15:00");
    });

    test("idle for exactly the timeout is still valid", async () => {
      await h.monitor.onLogin("42", userRequest());
      h.clock.advance(1800);
      expect(await h.monitor.validateSession(userRequest())).toEqual({ valid: true });
    });

    test("idle past the timeout expires the session", async () => {
      await h.monitor.onLogin("42", userRequest());
      h.clock.advance(1801);

      expect(await h.monitor.validateSession(userRequest())).toEqual({
        valid: false,
        reason: "expired",
        forceLogout: true,
      });
      expect(h.platform.destroyedAll).toEqual(["42"]);
      expect(await h.monitor.getSessionInfo("42")).toBeNull();
    });

    test("a session idle past its stored lifetime is still reported expired", async () => {
      await h.monitor.onLogin("42", userRequest());
      h.clock.advance(90_000);

      expect(await h.monitor.validateSession(userRequest())).toEqual({
        valid: false,
        reason: "expired",
        forceLogout: true,
      });
      expect(h.platform.destroyedAll).toEqual(["42"]);
      expect(await h.durable.getUserField("42", "_session_data")).toBeUndefined();
      expect(h.eventBus.getHistory({ type: "SessionEndedEvent" }).map((e) => e.payload)).toEqual([
        { userId: "42", reason: "expired" },
      ]);
    });

    test("a session older than the maximum age expires even when active", async () => {
      await h.monitor.onLogin("42", userRequest());

      for (let i = 1; i <= 86; i++) {
        h.clock.advance(1000);
        expect(await h.monitor.validateSession(userRequest())).toEqual({ valid: true });
      }

      h.clock.advance(1000);
      expect(await h.monitor.validateSession(userRequest())).toEqual({
        valid: false,
        reason: "expired",
        forceLogout: true,
      });
    });

    test("an IP change alone is logged but tolerated", async () => {
      await h.monitor.onLogin("42", userRequest());

      expect(await h.monitor.validateSession(userRequest("198.51.100.7"))).toEqual({ valid: true });

      const events = await h.sink.getUserSecurityEvents("42");
      expect(events).toHaveLength(1);
      expect(events[0].eventType).toBe("ip_change");
      expect(events[0].data).toEqual({ oldIp: HOME_IP, newIp: "198.51.100.7" });

      await flushAsync();
      expect(h.mail.sent).toHaveLength(0);
      expect(await h.monitor.getSessionInfo("42")).not.toBeNull();
    });

    test("a user-agent change ends the session and alerts the admin", async () => {
      await h.monitor.onLogin("42", userRequest());

      expect(await h.monitor.validateSession(userRequest(HOME_IP, "Other/2.0"))).toEqual({
        valid: false,
        reason: "user_agent_change",
        forceLogout: true,
      });

      const events = await h.sink.getUserSecurityEvents("42");
      expect(events.map((e) => e.eventType)).toEqual(["user_agent_change"]);
      expect(events[0].data).toEqual({ oldUa: BROWSER, newUa: "Other/2.0" });
      expect(h.platform.destroyedAll).toEqual(["42"]);

      await flushAsync();
      expect(h.mail.sent).toHaveLength(1);
      expect(h.mail.sent[0].subject).toBe("[Test Site] Security Alert: User Agent Change");
      expect(h.mail.sent[0].body).toContain("User: Alice (alice@example.test)");
    });

    test("concurrent platform sessions end the session", async () => {
      await h.monitor.onLogin("42", userRequest());
      h.platform.active.set("42", 2);

      expect(await h.monitor.validateSession(userRequest())).toEqual({
        valid: false,
        reason: "concurrent_sessions",
        forceLogout: true,
      });

      await flushAsync();
      expect(h.mail.sent.map((m) => m.subject)).toEqual(["[Test Site] Security Alert: Concurrent Sessions"]);
    });

    test("no alert is sent for users the directory does not know", async () => {
      const anonymous = createHarness();
      await anonymous.monitor.onLogin("7", request(HOME_IP, BROWSER, { userId: "7" }));
      await anonymous.monitor.validateSession(request(HOME_IP, "Other/2.0", { userId: "7" }));

      await flushAsync();
      expect(anonymous.mail.sent).toHaveLength(0);
    });
  });

  describe("storage", () => {
    test("the durable copy serves reads after cache eviction", async () => {
      await h.monitor.onLogin("42", userRequest());
      await h.cache.delete("session_data_42");

      const info = await h.monitor.getSessionInfo("42");
      expect(info?.ipAddress).toBe(HOME_IP);
      expect(await h.cache.get("session_data_42")).toBeDefined();
    });

    test("logout removes both copies and keeps the login count", async () => {
      await h.monitor.onLogin("42", userRequest());
      await h.monitor.onLogout("42");

      expect(await h.monitor.getSessionInfo("42")).toBeNull();
      expect(h.durable.snapshot().users["42"]).toEqual({ _login_count: 1 });
    });
  });

  test("session tokens are 32 alphanumeric characters", () => {
    const tokens = new Set(Array.from({ length: 20 }, () => generateSessionToken()));
    expect(tokens.size).toBe(20);
    for (const token of tokens) {
      expect(token).toMatch(/^[A-Za-z0-9]{32}$/);
    }
  });
});
