import { afterEach, describe, expect, it } from "vitest";
import type { FastifyInstance } from "fastify";
import { createApp } from "../../src/server";
import { createOrchestrator } from "../../src/services/orchestrator";
import { createInMemoryWorkflowStore, type WorkflowStore } from "../../src/services/workflow-store";
import { PROJECT_FILES_COLLECTION } from "../../src/services/document-store";
import { createFetcher, createInvoker } from "../helpers/fakes";

const baseBody = {
  input: "",
  session_id: "session-1",
  docslink: "https://docs.payments.test",
  repo: "acme/web",
  project: "project-1",
  suggested_files: ["app.py"],
  suggested_file_urls: [],
  chat_history: []
};

let app: FastifyInstance | undefined;

async function buildApp(outputs: string[]) {
  const store: WorkflowStore = createInMemoryWorkflowStore();
  const invoker = createInvoker(...outputs);
  const workflow = createOrchestrator({ store, invoker, fetcher: createFetcher() });
  app = createApp({ workflow, logLevel: "silent" });
  await app.ready();
  return { app, store, invoker };
}

afterEach(async () => {
  await app?.close();
  app = undefined;
});

describe("agent routes", () => {
  it("runs the current stage and advances the session", async () => {
    const { app, store } = await buildApp(["```python\nprint('proxy')\n```"]);

    const response = await app.inject({ method: "POST", url: "/agent/invoke", payload: baseBody });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ stage: 2, message: "Backend endpoints generated", output: "print('proxy')\n" });
    await expect(store.documents.get(PROJECT_FILES_COLLECTION, "app.py")).resolves.toMatchObject({
      code: "print('proxy')\n",
      project: "project-1"
    });
    await expect(store.sessions.get("session-1")).resolves.toEqual({ stage: 3, backendCode: "print('proxy')\n" });
  });

  it("accepts null sequences", async () => {
    const { app, store } = await buildApp(["print('proxy')"]);

    const response = await app.inject({
      method: "POST",
      url: "/agent/invoke",
      payload: { ...baseBody, suggested_files: null, capabilityRefs: null }
    });

    expect(response.statusCode).toBe(200);
    await expect(store.documents.get(PROJECT_FILES_COLLECTION, "app.py")).resolves.toMatchObject({
      code: "print('proxy')"
    });
  });

  it("returns the api key steps as lines", async () => {
    const { app, store } = await buildApp(["Step one\nStep two"]);
    await store.sessions.set("session-1", { stage: 9 });

    const response = await app.inject({ method: "POST", url: "/agent/invoke", payload: baseBody });

    expect(response.json()).toEqual({ stage: 9, message: "API Key info sent", output: ["Step one", "Step two"] });
  });

  it("rejects a body without a session id", async () => {
    const { app, invoker } = await buildApp([]);

    const response = await app.inject({
      method: "POST",
      url: "/agent/invoke",
      payload: { ...baseBody, session_id: "" }
    });

    expect(response.statusCode).toBe(400);
    const body = response.json();
    expect(body.error).toBe("INVALID_REQUEST");
    expect(body.issues[0].path).toEqual(["session_id"]);
    expect(invoker.invoke).not.toHaveBeenCalled();
  });

  it("rejects capability references that are not document paths", async () => {
    const { app } = await buildApp([]);

    const response = await app.inject({
      method: "POST",
      url: "/agent/invoke",
      payload: { ...baseBody, capabilityRefs: ["charge"] }
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().issues[0].message).toBe("Expected a collection/key path");
  });

  it("answers 409 once the workflow is complete", async () => {
    const { app, store } = await buildApp([]);
    await store.sessions.set("session-1", { stage: 10 });

    const response = await app.inject({ method: "POST", url: "/agent/invoke", payload: baseBody });

    expect(response.statusCode).toBe(409);
    expect(response.json()).toEqual({
      error: "SESSION_COMPLETE",
      message: "Session session-1 has completed every stage"
    });
  });

  it("answers 422 when the review stage has no frontend file", async () => {
    const { app, store } = await buildApp([]);
    await store.sessions.set("session-1", { stage: 6, backendCode: "print('proxy')" });

    const response = await app.inject({ method: "POST", url: "/agent/invoke", payload: baseBody });

    expect(response.statusCode).toBe(422);
    expect(response.json().error).toBe("FRONTEND_FILE_MISSING");
  });

  it("hides collaborator failures behind a 500", async () => {
    const store = createInMemoryWorkflowStore();
    const workflow = createOrchestrator({
      store,
      invoker: {
        async invoke() {
          throw new Error("upstream unavailable");
        }
      },
      fetcher: createFetcher()
    });
    app = createApp({ workflow, logLevel: "silent" });
    await app.ready();

    const response = await app.inject({ method: "POST", url: "/agent/invoke", payload: baseBody });

    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({ error: "INTERNAL_SERVER_ERROR" });
    await expect(store.sessions.get("session-1")).resolves.toEqual({ stage: 2 });
  });
});
