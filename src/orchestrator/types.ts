import type { FastifyBaseLogger } from "fastify";
import type { DocumentFields } from "../db/schema";
import type { ActiveStage, SessionState, StateAt } from "./session-state";

export type StageLogger = Pick<FastifyBaseLogger, "debug" | "info" | "warn" | "error">;

export type ChatRole = "user" | "assistant" | "system";

export type ChatMessage = {
  role: ChatRole;
  content: string;
};

/** A normalized `/agent/invoke` request. */
export type AgentRequest = {
  sessionId: string;
  input: string;
  docsLink: string;
  repo: string;
  projectId: string;
  suggestedFiles: string[];
  suggestedFileUrls: string[];
  suggestedFilePaths: string[];
  capabilityRefs: string[];
  chatHistory: ChatMessage[];
};

export type AgentTool =
  | { type: "docs_retriever"; url: string }
  | { type: "web_search" };

export type AgentInvocation = {
  systemPrompt: string;
  userPrompt: string;
  chatHistory: ChatMessage[];
  tools: AgentTool[];
};

export type AgentReply = {
  output?: string;
};

export interface AgentInvoker {
  invoke(invocation: AgentInvocation): Promise<AgentReply>;
}

export const capabilityFields = [
  "name",
  "endPoint",
  "headers",
  "routeName",
  "errorBody",
  "requestBody",
  "responseBody",
  "requestGuidance",
  "responseGuidance"
] as const;

export type CapabilityField = (typeof capabilityFields)[number];
export type CapabilityRecord = Record<CapabilityField, string>;
/** Capability records split into index-aligned sequences, one per field. */
export type CapabilitySequences = Record<CapabilityField, string[]>;

/**
 * Values for one request's prompts. Everything under `prompt` has had its
 * braces doubled and may be embedded in template text.
 */
export type StageContext = {
  capabilities: CapabilitySequences;
  prompt: {
    docsLink: string;
    input: string;
    capabilities: CapabilitySequences;
    referencePage: string;
  };
  frontendFile?: string;
  tools: AgentTool[];
};

export type ArtifactWrite = {
  /** `set` creates or replaces, `update` merges into an existing document. */
  mode: "set" | "update";
  collection: string;
  key: string;
  fields: DocumentFields;
};

export type StageResponse = {
  stage: ActiveStage;
  message: string;
  output: string | string[];
};

export type StageOutcome = {
  response: StageResponse;
  writes: ArtifactWrite[];
  next: SessionState;
};

export type StageWriterArgs<S extends ActiveStage> = {
  state: StateAt<S>;
  request: AgentRequest;
  context: StageContext;
  invoker: AgentInvoker;
  documents: DocumentReader;
  logger: StageLogger;
  now: () => Date;
};

export type StageWriter<S extends ActiveStage> = (args: StageWriterArgs<S>) => Promise<StageOutcome>;

export interface DocumentReader {
  get(collection: string, key: string): Promise<DocumentFields | undefined>;
}
