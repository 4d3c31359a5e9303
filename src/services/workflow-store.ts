import type { DrizzleClient } from "../db/client";
import { sessions } from "../db/schema";
import type { ArtifactWrite } from "../orchestrator/types";
import type { SessionState } from "../orchestrator/session-state";
import {
  DocumentNotFoundError,
  DrizzleDocumentStore,
  InMemoryDocumentStore,
  writeDocuments,
  type DocumentStore
} from "./document-store";
import {
  DrizzleSessionStore,
  InMemorySessionStore,
  type SessionStore,
  type SessionStoreOptions
} from "./session-store";

export interface WorkflowStore {
  readonly sessions: SessionStore;
  readonly documents: DocumentStore;
  /**
   * Persists a stage's artifacts and moves the session to its next state as
   * one unit: either every write lands and the session advances, or nothing
   * changes.
   */
  commitStage(sessionId: string, writes: ArtifactWrite[], next: SessionState): Promise<void>;
}

export function createInMemoryWorkflowStore(options: SessionStoreOptions = {}): WorkflowStore {
  const sessionStore = new InMemorySessionStore(options);
  const documentStore = new InMemoryDocumentStore();

  return {
    sessions: sessionStore,
    documents: documentStore,
    async commitStage(sessionId, writes, next) {
      for (const write of writes) {
        if (write.mode === "update" && !documentStore.has(write.collection, write.key)) {
          throw new DocumentNotFoundError(write.collection, write.key);
        }
      }
      // No awaits past this point, so no other request observes a half-applied stage.
      for (const write of writes) {
        documentStore.apply(write);
      }
      sessionStore.replace(sessionId, next);
    }
  };
}

export type DrizzleWorkflowStoreOptions = SessionStoreOptions & {
  /** Keep session state in process instead of the sessions table. */
  sessionsInMemory?: boolean;
};

export function createDrizzleWorkflowStore(
  db: DrizzleClient,
  options: DrizzleWorkflowStoreOptions = {}
): WorkflowStore {
  const documentStore = new DrizzleDocumentStore(db);

  if (options.sessionsInMemory) {
    const sessionStore = new InMemorySessionStore(options);
    return {
      sessions: sessionStore,
      documents: documentStore,
      async commitStage(sessionId, writes, next) {
        await db.transaction(async (tx) => {
          await writeDocuments(tx, writes);
        });
        sessionStore.replace(sessionId, next);
      }
    };
  }

  return {
    sessions: new DrizzleSessionStore(db, options),
    documents: documentStore,
    async commitStage(sessionId, writes, next) {
      await db.transaction(async (tx) => {
        await writeDocuments(tx, writes);
        const updatedAt = Date.now();
        await tx
          .insert(sessions)
          .values({ sessionId, stage: next.stage, state: next, updatedAt })
          .onConflictDoUpdate({
            target: sessions.sessionId,
            set: { stage: next.stage, state: next, updatedAt }
          });
      });
    }
  };
}
