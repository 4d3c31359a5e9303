import { z } from "zod";
import type { AgentRequest } from "../orchestrator/types";

const optionalList = z
  .array(z.string())
  .nullish()
  .transform((value) => value ?? []);

const DOCUMENT_PATH = /^[^/]+(\/[^/]+)+$/;

export const agentRequestSchema = z.object({
  input: z.string().default(""),
  session_id: z.string().min(1),
  docslink: z.string(),
  repo: z.string(),
  project: z.string().min(1),
  suggested_files: optionalList,
  suggested_file_urls: optionalList,
  suggested_file_paths: optionalList,
  capabilityRefs: z
    .array(z.string().regex(DOCUMENT_PATH, "Expected a collection/key path"))
    .nullish()
    .transform((value) => value ?? []),
  chat_history: z
    .array(
      z.object({
        role: z.enum(["user", "assistant", "system"]),
        content: z.string()
      })
    )
    .default([])
});

export type AgentRequestBody = z.infer<typeof agentRequestSchema>;

export function toAgentRequest(body: AgentRequestBody): AgentRequest {
  return {
    sessionId: body.session_id,
    input: body.input,
    docsLink: body.docslink,
    repo: body.repo,
    projectId: body.project,
    suggestedFiles: body.suggested_files,
    suggestedFileUrls: body.suggested_file_urls,
    suggestedFilePaths: body.suggested_file_paths,
    capabilityRefs: body.capabilityRefs,
    chatHistory: body.chat_history
  };
}
