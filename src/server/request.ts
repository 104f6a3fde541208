/**
 * Express request -> ClientRequest adapter.
 * The adapted request is memoized per Express request so every middleware
 * on the same request shares one lifecycle memo.
 */

import { Request } from "express";
import { ClientRequest, createRequestLifecycle } from "../core/identity/clientIdentity";

const contexts = new WeakMap<Request, ClientRequest>();

export function fromExpressRequest(req: Request): ClientRequest {
  let context = contexts.get(req);
  if (!context) {
    context = {
      headers: req.headers,
      remoteAddress: req.socket.remoteAddress,
      path: req.originalUrl,
      lifecycle: createRequestLifecycle(),
    };
    contexts.set(req, context);
  }
  return context;
}

export const SESSION_TOKEN_HEADER = "x-session-token";

export function sessionTokenOf(req: Request): string | undefined {
  const value = req.headers[SESSION_TOKEN_HEADER];
  const token = Array.isArray(value) ? value[0] : value;
  return token ? token.trim() || undefined : undefined;
}
