/**
 * JWT helpers for the admin API
 */

import jwt from "jsonwebtoken";
import { AuthenticationError } from "../core/errors";

export interface AdminClaims {
  sub: string;
  roles: string[];
}

export const ADMIN_ROLE = "admin";

export function signToken(subject: string, secret: string, opts?: jwt.SignOptions): string {
  return jwt.sign({ roles: [ADMIN_ROLE] }, secret, {
    expiresIn: "1h",
    ...opts,
    subject,
  });
}

/**
 * Verify and decode an admin token
 */
export function verifyToken(token: string, secret: string): AdminClaims {
  let decoded: string | jwt.JwtPayload;
  try {
    decoded = jwt.verify(token, secret);
  } catch (err: unknown) {
    if (err instanceof jwt.TokenExpiredError) {
      throw new AuthenticationError("Token expired");
    }
    throw new AuthenticationError("Invalid token");
  }

  if (typeof decoded === "string" || typeof decoded.sub !== "string") {
    throw new AuthenticationError("Invalid token");
  }
  const roles: unknown = decoded.roles;
  return {
    sub: decoded.sub,
    roles: Array.isArray(roles) ? roles.filter((r): r is string => typeof r === "string") : [],
  };
}

/**
 * Bearer token from the Authorization header
 */
export function extractToken(headers: { authorization?: string }): string | null {
  const authHeader = headers.authorization;
  if (authHeader && authHeader.startsWith("Bearer ")) {
    return authHeader.substring(7).trim() || null;
  }
  return null;
}
