/**
 * In-process host collaborators used by the bundled HTTP server: a session
 * token registry and a static user list. Applications embedding the guard
 * supply their own implementations of these interfaces.
 */

import { timingSafeEqual } from "node:crypto";
import { Clock, systemClock } from "../core/clock";
import { UserDirectory, UserProfile } from "../core/events/eventSink";
import { DEFAULT_SESSION_CONFIG, SessionPlatform, generateSessionToken } from "../core/session/sessionMonitor";

export interface AuthenticatedUser {
  id: string;
  username: string;
}

export interface CredentialVerifier {
  verify(username: string, password: string): Promise<AuthenticatedUser | null>;
}

export interface StaticUser extends UserProfile {
  id: string;
  username: string;
  password: string;
}

function sameSecret(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && timingSafeEqual(left, right);
}

export class StaticUserDirectory implements CredentialVerifier, UserDirectory {
  private readonly byUsername = new Map<string, StaticUser>();
  private readonly byId = new Map<string, StaticUser>();

  constructor(users: StaticUser[] = []) {
    for (const user of users) {
      this.byUsername.set(user.username, user);
      this.byId.set(user.id, user);
    }
  }

  async verify(username: string, password: string): Promise<AuthenticatedUser | null> {
    const user = this.byUsername.get(username);
    if (!user || !sameSecret(user.password, password)) return null;
    return { id: user.id, username: user.username };
  }

  async findUser(userId: string): Promise<UserProfile | null> {
    const user = this.byId.get(userId);
    return user ? { displayName: user.displayName, email: user.email } : null;
  }
}

/**
 * Session layer of the bundled server: issues the tokens the monitor polices
 */
export interface HostSessionPlatform extends SessionPlatform {
  createSession(userId: string): string;
  lookup(token: string): string | undefined;
  destroySession(token: string): void;
}

interface IssuedSession {
  userId: string;
  createdAt: number;
}

/**
 * Tokens live at most `maxAge` seconds from issue, whatever the monitor
 * still has on record
 */
export class InMemorySessionPlatform implements HostSessionPlatform {
  private readonly sessions = new Map<string, IssuedSession>();

  constructor(
    private readonly clock: Clock = systemClock,
    private readonly maxAge: number = DEFAULT_SESSION_CONFIG.maxSessionAge
  ) {}

  createSession(userId: string): string {
    const token = generateSessionToken(40);
    this.sessions.set(token, { userId, createdAt: this.clock.now() });
    return token;
  }

  lookup(token: string): string | undefined {
    const session = this.sessions.get(token);
    if (!session) return undefined;
    if (this.isExpired(session)) {
      this.sessions.delete(token);
      return undefined;
    }
    return session.userId;
  }

  destroySession(token: string): void {
    this.sessions.delete(token);
  }

  async countActiveSessions(userId: string): Promise<number> {
    let count = 0;
    for (const session of this.sessions.values()) {
      if (session.userId === userId && !this.isExpired(session)) count++;
    }
    return count;
  }

  async destroyOtherSessions(userId: string, currentToken?: string): Promise<void> {
    for (const [token, session] of this.sessions) {
      if (session.userId === userId && token !== currentToken) {
        this.sessions.delete(token);
      }
    }
  }

  async destroyAllSessions(userId: string): Promise<void> {
    await this.destroyOtherSessions(userId);
  }

  private isExpired(session: IssuedSession): boolean {
    return this.clock.now() - session.createdAt > this.maxAge;
  }
}
