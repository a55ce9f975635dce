/**
 * Per-browser chat state for the web API. Held in process memory and keyed by
 * an opaque cookie; it does not survive a restart.
 */

import { randomUUID } from "node:crypto";
import type { ConversationTurn, FarmerContext } from "./types";

export const SESSION_COOKIE = "croptalk_session";

export type SessionState = {
  cropInfo: FarmerContext | null;
  history: ConversationTurn[];
};

export interface SessionStore {
  create(): string;
  get(id: string | undefined): SessionState | null;
  save(id: string, state: SessionState): void;
  clear(id: string): void;
}

function emptySession(): SessionState {
  return { cropInfo: null, history: [] };
}

export class MemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, SessionState>();

  create(): string {
    const id = randomUUID();
    this.sessions.set(id, emptySession());
    return id;
  }

  get(id: string | undefined): SessionState | null {
    if (!id) return null;
    const state = this.sessions.get(id);
    return state ? { cropInfo: state.cropInfo, history: [...state.history] } : null;
  }

  save(id: string, state: SessionState): void {
    this.sessions.set(id, { cropInfo: state.cropInfo, history: [...state.history] });
  }

  clear(id: string): void {
    this.sessions.delete(id);
  }
}

/** Returns the caller's session, creating one when the cookie is missing or stale. */
export function resolveSession(
  store: SessionStore,
  id: string | undefined
): { id: string; state: SessionState; created: boolean } {
  const state = store.get(id);
  if (id && state) return { id, state, created: false };
  const fresh = store.create();
  return { id: fresh, state: emptySession(), created: true };
}
