/**
 * Shared test harness: manual clock, in-memory stores and recording fakes
 */

import { BruteForceGuard } from "../src/core/brute-force/bruteForceGuard";
import { ManualClock } from "../src/core/clock";
import { EventBus } from "../src/core/eventBus";
import { SecurityEventSink, UserDirectory, UserProfile } from "../src/core/events/eventSink";
import { ClientIdentityResolver, ClientRequest, createRequestLifecycle } from "../src/core/identity/clientIdentity";
import { AdminNotifier, Notifier } from "../src/core/notify/notifier";
import { RateLimiter } from "../src/core/rate-limit/rateLimiter";
import { RateLimitRules } from "../src/core/rate-limit/rules";
import { SessionMonitor, SessionPlatform } from "../src/core/session/sessionMonitor";
import { MemoryDurableStore } from "../src/core/storage/durableStore";
import { MemoryExpiringStore } from "../src/core/storage/expiringStore";

export interface SentMail {
  to: string;
  subject: string;
  body: string;
}

export class RecordingNotifier implements Notifier {
  sent: SentMail[] = [];
  failWith?: Error;

  async send(to: string, subject: string, body: string): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.sent.push({ to, subject, body });
  }
}

export class FakePlatform implements SessionPlatform {
  active = new Map<string, number>();
  destroyedOthers: Array<{ userId: string; currentToken?: string }> = [];
  destroyedAll: string[] = [];

  async countActiveSessions(userId: string): Promise<number> {
    return this.active.get(userId) ?? 1;
  }

  async destroyOtherSessions(userId: string, currentToken?: string): Promise<void> {
    this.destroyedOthers.push({ userId, currentToken });
  }

  async destroyAllSessions(userId: string): Promise<void> {
    this.destroyedAll.push(userId);
  }
}

export class FakeUsers implements UserDirectory {
  constructor(private readonly users: Record<string, UserProfile> = {}) {}

  async findUser(userId: string): Promise<UserProfile | null> {
    return this.users[userId] ?? null;
  }
}

/** pino destination that keeps every line */
export class MemoryDestination {
  lines: string[] = [];

  write(msg: string): void {
    this.lines.push(msg);
  }

  records(): Array<Record<string, unknown>> {
    return this.lines.map((line) => JSON.parse(line));
  }
}

export function request(ip: string, userAgent = "TestAgent/1.0", extra: Partial<ClientRequest> = {}): ClientRequest {
  return {
    headers: { "user-agent": userAgent },
    remoteAddress: ip,
    lifecycle: createRequestLifecycle(),
    ...extra,
  };
}

/** Let fire-and-forget promise chains settle */
export async function flushAsync(): Promise<void> {
  for (let i = 0; i < 5; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}

export function createHarness(options: { users?: Record<string, UserProfile> } = {}) {
  const clock = new ManualClock();
  const eventBus = new EventBus();
  const cache = new MemoryExpiringStore(clock);
  const durable = new MemoryDurableStore();
  const resolver = new ClientIdentityResolver();
  const mail = new RecordingNotifier();
  const notifier = new AdminNotifier(mail, { adminEmail: "admin@example.test", siteName: "Test Site" }, eventBus);
  const users = new FakeUsers(options.users);
  const sink = new SecurityEventSink({ store: cache, eventBus, notifier, clock, users });
  const platform = new FakePlatform();
  const rules = new RateLimitRules();

  const guard = new BruteForceGuard({ cache, durable, resolver, sink, notifier, eventBus, clock });
  const monitor = new SessionMonitor({ cache, durable, resolver, sink, platform, eventBus, clock });
  const limiter = new RateLimiter({ store: cache, rules, resolver, eventBus });

  return { clock, eventBus, cache, durable, resolver, mail, notifier, sink, platform, rules, guard, monitor, limiter };
}
