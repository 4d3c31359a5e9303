import { eq } from "drizzle-orm";
import type { DrizzleClient } from "../db/client";
import { sessions } from "../db/schema";
import {
  initialSessionState,
  sessionStateSchema,
  type DefaultStage,
  type SessionState
} from "../orchestrator/session-state";

export interface SessionStore {
  /** Stored state, or the default state for a session never seen before. */
  get(sessionId: string): Promise<SessionState>;
  /** Replaces the stored state wholesale. */
  set(sessionId: string, state: SessionState): Promise<void>;
}

export type SessionStoreOptions = {
  defaultStage?: DefaultStage;
};

// Unseen sessions start at stage 2 unless configured otherwise, which skips
// the documentation review. Callers wanting stage 1 initialize the session.
const DEFAULT_STAGE: DefaultStage = 2;

export class InMemorySessionStore implements SessionStore {
  private readonly states = new Map<string, SessionState>();
  private readonly defaultStage: DefaultStage;

  constructor(options: SessionStoreOptions = {}) {
    this.defaultStage = options.defaultStage ?? DEFAULT_STAGE;
  }

  async get(sessionId: string) {
    return this.states.get(sessionId) ?? initialSessionState(this.defaultStage);
  }

  async set(sessionId: string, state: SessionState) {
    this.replace(sessionId, state);
  }

  replace(sessionId: string, state: SessionState) {
    this.states.set(sessionId, state);
  }
}

export class DrizzleSessionStore implements SessionStore {
  private readonly defaultStage: DefaultStage;

  constructor(
    private readonly db: DrizzleClient,
    options: SessionStoreOptions = {}
  ) {
    this.defaultStage = options.defaultStage ?? DEFAULT_STAGE;
  }

  async get(sessionId: string) {
    const row = await this.db.query.sessions.findFirst({
      where: eq(sessions.sessionId, sessionId)
    });
    if (!row) {
      return initialSessionState(this.defaultStage);
    }
    return sessionStateSchema.parse(row.state);
  }

  async set(sessionId: string, state: SessionState) {
    const updatedAt = Date.now();
    await this.db
      .insert(sessions)
      .values({ sessionId, stage: state.stage, state, updatedAt })
      .onConflictDoUpdate({
        target: sessions.sessionId,
        set: { stage: state.stage, state, updatedAt }
      });
  }
}
