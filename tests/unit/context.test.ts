import { describe, expect, it } from "vitest";
import {
  FILE_SEPARATOR,
  buildStageContext,
  escapeBraces,
  fetchCapabilities,
  findFrontendFile,
  toCapabilityRecord
} from "../../src/orchestrator/context";
import type { AgentRequest } from "../../src/orchestrator/types";
import { InMemoryDocumentStore } from "../../src/services/document-store";
import { createFetcher, createLogger } from "../helpers/fakes";

const chargeCapability = {
  name: "Create charge",
  endPoint: "https://api.payments.test/v1/charges",
  headers: "Authorization: Bearer <key>",
  routeName: "/charge",
  errorBody: '{"error": "string"}',
  requestBody: '{"amount": "number"}',
  responseBody: '{"id": "string"}',
  requestGuidance: "Amount is in cents",
  responseGuidance: "Show the charge id"
};

function request(overrides: Partial<AgentRequest> = {}): AgentRequest {
  return {
    sessionId: "session-1",
    input: "",
    docsLink: "https://docs.payments.test",
    repo: "acme/web",
    projectId: "project-1",
    suggestedFiles: [],
    suggestedFileUrls: [],
    suggestedFilePaths: [],
    capabilityRefs: [],
    chatHistory: [],
    ...overrides
  };
}

describe("escapeBraces", () => {
  it("doubles every brace", () => {
    expect(escapeBraces('{"a": {"b": 1}}')).toBe('{{"a": {{"b": 1}}}}');
  });
});

describe("toCapabilityRecord", () => {
  it("fills missing fields and serializes structured values", () => {
    const record = toCapabilityRecord({ name: "Refund", requestBody: { amount: "number" } });

    expect(record.name).toBe("Refund");
    expect(record.requestBody).toBe('{"amount":"number"}');
    expect(record.headers).toBe("No headers");
    expect(record.endPoint).toBe("No endPoint");
  });
});

describe("fetchCapabilities", () => {
  it("skips missing records and keeps the order of the rest", async () => {
    const store = new InMemoryDocumentStore();
    await store.set("providers/payments/capabilities", "charge", chargeCapability);
    await store.set("providers/payments/capabilities", "refund", { ...chargeCapability, name: "Refund" });
    const logger = createLogger();

    const sequences = await fetchCapabilities(
      store,
      [
        "providers/payments/capabilities/charge",
        "providers/payments/capabilities/missing",
        "providers/payments/capabilities/refund"
      ],
      logger
    );

    expect(sequences.name).toEqual(["Create charge", "Refund"]);
    expect(sequences.routeName).toEqual(["/charge", "/charge"]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(
      { ref: "providers/payments/capabilities/missing" },
      "Capability record not found, skipping"
    );
  });
});

describe("findFrontendFile", () => {
  it("picks the first .js file", () => {
    expect(findFrontendFile(["app.py", "Checkout.jsx", "Checkout.js", "Other.js"])).toBe("Checkout.js");
    expect(findFrontendFile(["app.py"])).toBeUndefined();
  });
});

describe("buildStageContext", () => {
  it("joins fetched files and escapes everything bound for prompts", async () => {
    const store = new InMemoryDocumentStore();
    await store.set("capabilities", "charge", chargeCapability);
    const fetcher = createFetcher({
      "https://files.test/a": "const a = { x: 1 };",
      "https://files.test/b": "const b = {};"
    });

    const context = await buildStageContext(
      { documents: store, fetcher, webSearch: true },
      request({
        input: "use {amount}",
        suggestedFiles: ["app.py", "Checkout.js"],
        suggestedFileUrls: ["https://files.test/a", "https://files.test/b"],
        capabilityRefs: ["capabilities/charge"]
      }),
      createLogger()
    );

    expect(context.prompt.referencePage).toBe(`const a = {{ x: 1 }};${FILE_SEPARATOR}const b = {{}};`);
    expect(context.prompt.input).toBe("use {{amount}}");
    expect(context.prompt.capabilities.errorBody).toEqual(['{{"error": "string"}}']);
    expect(context.capabilities.errorBody).toEqual(['{"error": "string"}']);
    expect(context.frontendFile).toBe("Checkout.js");
    expect(context.tools).toEqual([
      { type: "docs_retriever", url: "https://docs.payments.test" },
      { type: "web_search" }
    ]);
  });

  it("attaches no tools without a doc link or web search", async () => {
    const context = await buildStageContext(
      { documents: new InMemoryDocumentStore(), fetcher: createFetcher(), webSearch: false },
      request({ docsLink: "" }),
      createLogger()
    );

    expect(context.tools).toEqual([]);
    expect(context.prompt.referencePage).toBe("");
  });
});
