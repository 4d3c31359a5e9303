import { z } from "zod";
import type { DocumentFields } from "../db/schema";
import type { ContentFetcher } from "../services/content-fetcher";
import { parseDocumentPath, type DocumentStore } from "../services/document-store";
import {
  capabilityFields,
  type AgentRequest,
  type AgentTool,
  type CapabilityRecord,
  type CapabilitySequences,
  type StageContext,
  type StageLogger
} from "./types";

export const FILE_SEPARATOR = "\n\n---\n\n";

/** Doubles braces so template rendering reads them as literals. */
export function escapeBraces(text: string) {
  return text.replace(/\{/g, "{{").replace(/\}/g, "}}");
}

const capabilityValue = (field: string) =>
  z.preprocess(
    (value) => {
      if (value === undefined || value === null) return undefined;
      return typeof value === "string" ? value : JSON.stringify(value);
    },
    z.string().default(`No ${field}`)
  );

const capabilityRecordSchema = z.object({
  name: capabilityValue("name"),
  endPoint: capabilityValue("endPoint"),
  headers: capabilityValue("headers"),
  routeName: capabilityValue("routeName"),
  errorBody: capabilityValue("errorBody"),
  requestBody: capabilityValue("requestBody"),
  responseBody: capabilityValue("responseBody"),
  requestGuidance: capabilityValue("requestGuidance"),
  responseGuidance: capabilityValue("responseGuidance")
});

export function toCapabilityRecord(fields: DocumentFields): CapabilityRecord {
  return capabilityRecordSchema.parse(fields);
}

export function emptyCapabilitySequences(): CapabilitySequences {
  return {
    name: [],
    endPoint: [],
    headers: [],
    routeName: [],
    errorBody: [],
    requestBody: [],
    responseBody: [],
    requestGuidance: [],
    responseGuidance: []
  };
}

/**
 * Fetches every referenced capability record concurrently. Records that do not
 * exist are logged and left out; survivors keep their input order.
 */
export async function fetchCapabilities(
  store: Pick<DocumentStore, "get">,
  refs: string[],
  logger: StageLogger
): Promise<CapabilitySequences> {
  const records = await Promise.all(
    refs.map(async (ref) => {
      const { collection, key } = parseDocumentPath(ref);
      const fields = await store.get(collection, key);
      if (!fields) {
        logger.warn({ ref }, "Capability record not found, skipping");
        return undefined;
      }
      return toCapabilityRecord(fields);
    })
  );

  const sequences = emptyCapabilitySequences();
  for (const record of records) {
    if (!record) continue;
    for (const field of capabilityFields) {
      sequences[field].push(record[field]);
    }
  }
  return sequences;
}

export async function fetchReferenceFiles(fetcher: ContentFetcher, urls: string[]) {
  const contents = await Promise.all(urls.map((url) => fetcher.fetchRepositoryFile(url)));
  return contents.join(FILE_SEPARATOR);
}

export function escapeSequences(sequences: CapabilitySequences): CapabilitySequences {
  const escaped = emptyCapabilitySequences();
  for (const field of capabilityFields) {
    escaped[field] = sequences[field].map(escapeBraces);
  }
  return escaped;
}

/** First suggested file the review and styling stages treat as the frontend component. */
export function findFrontendFile(suggestedFiles: string[]) {
  return suggestedFiles.find((name) => name.endsWith(".js"));
}

export type StageContextDeps = {
  documents: Pick<DocumentStore, "get">;
  fetcher: ContentFetcher;
  webSearch: boolean;
};

export async function buildStageContext(
  deps: StageContextDeps,
  request: AgentRequest,
  logger: StageLogger
): Promise<StageContext> {
  const [capabilities, referencePage] = await Promise.all([
    fetchCapabilities(deps.documents, request.capabilityRefs, logger),
    fetchReferenceFiles(deps.fetcher, request.suggestedFileUrls)
  ]);

  const tools: AgentTool[] = [];
  if (request.docsLink) {
    tools.push({ type: "docs_retriever", url: request.docsLink });
  }
  if (deps.webSearch) {
    tools.push({ type: "web_search" });
  }

  return {
    capabilities,
    prompt: {
      docsLink: escapeBraces(request.docsLink),
      input: escapeBraces(request.input),
      capabilities: escapeSequences(capabilities),
      referencePage: escapeBraces(referencePage)
    },
    frontendFile: findFrontendFile(request.suggestedFiles),
    tools
  };
}
