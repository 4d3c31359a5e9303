import { and, eq } from "drizzle-orm";
import type { DrizzleClient } from "../db/client";
import { documents, type DocumentFields } from "../db/schema";
import type { ArtifactWrite } from "../orchestrator/types";

export const PROJECT_FILES_COLLECTION = "projectFiles";

export interface DocumentStore {
  get(collection: string, key: string): Promise<DocumentFields | undefined>;
  /** Creates the document or replaces all of its fields. */
  set(collection: string, key: string, fields: DocumentFields): Promise<void>;
  /** Merges fields into an existing document; fails when it does not exist. */
  update(collection: string, key: string, fields: DocumentFields): Promise<void>;
}

export class DocumentNotFoundError extends Error {
  constructor(
    public readonly collection: string,
    public readonly key: string
  ) {
    super(`No document ${collection}/${key}`);
    this.name = "DocumentNotFoundError";
  }
}

export type DocumentPath = {
  collection: string;
  key: string;
};

/** Splits `collection/key` (collections may nest) into its collection and key. */
export function parseDocumentPath(path: string): DocumentPath {
  const segments = path.split("/");
  if (segments.length < 2 || segments.some((segment) => segment.trim() === "")) {
    throw new Error(`Invalid document path: ${path}`);
  }
  const key = segments[segments.length - 1] ?? "";
  return { collection: segments.slice(0, -1).join("/"), key };
}

export class InMemoryDocumentStore implements DocumentStore {
  private readonly records = new Map<string, DocumentFields>();

  async get(collection: string, key: string) {
    const fields = this.records.get(recordKey(collection, key));
    return fields ? { ...fields } : undefined;
  }

  async set(collection: string, key: string, fields: DocumentFields) {
    this.records.set(recordKey(collection, key), { ...fields });
  }

  async update(collection: string, key: string, fields: DocumentFields) {
    this.apply({ mode: "update", collection, key, fields });
  }

  has(collection: string, key: string) {
    return this.records.has(recordKey(collection, key));
  }

  apply(write: ArtifactWrite) {
    const id = recordKey(write.collection, write.key);
    if (write.mode === "set") {
      this.records.set(id, { ...write.fields });
      return;
    }
    const existing = this.records.get(id);
    if (!existing) {
      throw new DocumentNotFoundError(write.collection, write.key);
    }
    this.records.set(id, { ...existing, ...write.fields });
  }
}

export class DrizzleDocumentStore implements DocumentStore {
  constructor(private readonly db: DrizzleClient) {}

  async get(collection: string, key: string) {
    const row = await this.db.query.documents.findFirst({
      where: (table) => and(eq(table.collection, collection), eq(table.key, key))
    });
    return row?.fields;
  }

  async set(collection: string, key: string, fields: DocumentFields) {
    await this.db.transaction((tx) => writeDocuments(tx, [{ mode: "set", collection, key, fields }]));
  }

  async update(collection: string, key: string, fields: DocumentFields) {
    await this.db.transaction((tx) => writeDocuments(tx, [{ mode: "update", collection, key, fields }]));
  }
}

export type DrizzleTransaction = Parameters<Parameters<DrizzleClient["transaction"]>[0]>[0];

export async function writeDocuments(tx: DrizzleTransaction, writes: ArtifactWrite[]) {
  for (const write of writes) {
    const updatedAt = Date.now();
    if (write.mode === "set") {
      await tx
        .insert(documents)
        .values({ collection: write.collection, key: write.key, fields: write.fields, updatedAt })
        .onConflictDoUpdate({
          target: [documents.collection, documents.key],
          set: { fields: write.fields, updatedAt }
        });
      continue;
    }

    const existing = await tx.query.documents.findFirst({
      where: (table) => and(eq(table.collection, write.collection), eq(table.key, write.key))
    });
    if (!existing) {
      throw new DocumentNotFoundError(write.collection, write.key);
    }
    await tx
      .update(documents)
      .set({ fields: { ...existing.fields, ...write.fields }, updatedAt })
      .where(and(eq(documents.collection, write.collection), eq(documents.key, write.key)));
  }
}

function recordKey(collection: string, key: string) {
  return `${collection}\u0000${key}`;
}
