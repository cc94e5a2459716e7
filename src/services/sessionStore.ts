// src/services/sessionStore.ts
// Per-session state: the user's macro targets and the meal being built.
// Each SessionContext is owned by one client session, never process-wide.

import { v4 as uuid } from "uuid";
import { MacroTotals, MealSelection } from "../domain/types";
import { CleanableEntry, CleanableMap } from "./memoryCleanup";

export const DEFAULT_SESSION_ID = "default";

export interface MealDraft {
  tag: string;
  items: MealSelection[];
}

export interface SessionContext {
  id: string;
  targets: MacroTotals;
  draft: MealDraft;
}

function emptyDraft(): MealDraft {
  return { tag: "", items: [] };
}

export const DEFAULT_SESSION_IDLE_MS = 24 * 60 * 60 * 1000;
export const DEFAULT_MAX_SESSIONS = 10000;

export interface SessionStoreOptions {
  idleTtlMs?: number;
  maxSessions?: number;
  clock?: () => number;
}

interface SessionEntry extends CleanableEntry {
  ctx: SessionContext;
}

/**
 * Sessions idle longer than `idleTtlMs` are dropped, and the least recently
 * used give way past `maxSessions`. A dropped id starts over from the
 * default targets on its next request.
 */
export class SessionStore {
  private readonly sessions: CleanableMap<string, SessionEntry>;

  constructor(
    private readonly defaultTargets: MacroTotals,
    options: SessionStoreOptions = {}
  ) {
    this.sessions = new CleanableMap<string, SessionEntry>({
      ttlMs: options.idleTtlMs ?? DEFAULT_SESSION_IDLE_MS,
      maxEntries: options.maxSessions ?? DEFAULT_MAX_SESSIONS,
      clock: options.clock,
      onCleanup: (removed) => {
        console.log(`[sessions] Removed ${removed} idle sessions`);
      },
    });
  }

  /** Returns the session, creating it with default targets on first use. */
  get(id: string = DEFAULT_SESSION_ID): SessionContext {
    const existing = this.sessions.touch(id);
    if (existing) return existing.ctx;

    const ctx: SessionContext = {
      id,
      targets: { ...this.defaultTargets },
      draft: emptyDraft(),
    };
    this.sessions.set(id, { ctx, lastSeenAt: this.sessions.now() });
    return ctx;
  }

  create(): SessionContext {
    return this.get(uuid());
  }

  /** Sweeps idle sessions now; returns how many were dropped. */
  evictIdle(): number {
    return this.sessions.cleanup();
  }

  get size(): number {
    return this.sessions.size;
  }
}

export function updateTargets(ctx: SessionContext, patch: Partial<MacroTotals>): MacroTotals {
  ctx.targets = { ...ctx.targets, ...patch };
  return ctx.targets;
}

export function setDraft(ctx: SessionContext, draft: MealDraft): MealDraft {
  ctx.draft = { tag: draft.tag, items: draft.items.map((i) => ({ ...i })) };
  return ctx.draft;
}

export function resetDraft(ctx: SessionContext): MealDraft {
  ctx.draft = emptyDraft();
  return ctx.draft;
}
