import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { eq } from "drizzle-orm";
import { sessions } from "../../src/db/schema";
import { DrizzleSessionStore, InMemorySessionStore } from "../../src/services/session-store";
import { createTestDatabase, type TestDatabase } from "../helpers/database";

describe("InMemorySessionStore", () => {
  it("defaults unseen sessions to stage 2", async () => {
    const store = new InMemorySessionStore();
    await expect(store.get("unseen")).resolves.toEqual({ stage: 2 });
  });

  it("honours a configured default stage", async () => {
    const store = new InMemorySessionStore({ defaultStage: 1 });
    await expect(store.get("unseen")).resolves.toEqual({ stage: 1 });
  });

  it("replaces state wholesale", async () => {
    const store = new InMemorySessionStore();
    await store.set("s1", { stage: 4, backendCode: "backend", uiCode: "ui" });
    await store.set("s1", { stage: 9 });

    await expect(store.get("s1")).resolves.toEqual({ stage: 9 });
  });
});

describe("DrizzleSessionStore", () => {
  let database: TestDatabase;

  beforeEach(async () => {
    database = await createTestDatabase();
  });

  afterEach(() => {
    database.dispose();
  });

  it("defaults unseen sessions to stage 2", async () => {
    const store = new DrizzleSessionStore(database.db);
    await expect(store.get("unseen")).resolves.toEqual({ stage: 2 });
  });

  it("round-trips the state and mirrors the stage column", async () => {
    const store = new DrizzleSessionStore(database.db);
    await store.set("s1", { stage: 3, backendCode: "print('proxy')" });
    await store.set("s1", { stage: 8, backendCode: "print('proxy')", frontendCode: "export default App;" });

    await expect(store.get("s1")).resolves.toEqual({
      stage: 8,
      backendCode: "print('proxy')",
      frontendCode: "export default App;"
    });
    const row = await database.db.query.sessions.findFirst({ where: eq(sessions.sessionId, "s1") });
    expect(row?.stage).toBe(8);
  });

  it("rejects stored state that no longer matches its stage", async () => {
    await database.db.insert(sessions).values({ sessionId: "broken", stage: 3, state: { stage: 3 } });
    const store = new DrizzleSessionStore(database.db);

    await expect(store.get("broken")).rejects.toThrow();
  });
});
