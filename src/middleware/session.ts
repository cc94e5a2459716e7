// src/middleware/session.ts
import { Request } from "express";
import { DEFAULT_SESSION_ID, SessionContext, SessionStore } from "../services/sessionStore";

export const SESSION_HEADER = "x-session-id";

/** Session named by the X-Session-Id header, or the shared default session. */
export function sessionFor(req: Request, sessions: SessionStore): SessionContext {
  const raw = req.headers[SESSION_HEADER];
  const id = (Array.isArray(raw) ? raw[0] : raw)?.trim();
  if (id && id.length > 128) {
    throw new Error("INVALID_SESSION_ID");
  }
  return sessions.get(id || DEFAULT_SESSION_ID);
}
