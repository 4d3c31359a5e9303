import OpenAI from "openai";
import type { ResponseInput, Tool } from "openai/resources/responses/responses";
import { env } from "../env";
import type { AgentInvocation, AgentInvoker, AgentReply } from "../orchestrator/types";
import type { ContentFetcher } from "../services/content-fetcher";
import { extractPageText } from "../utils/page-text";

const GENERATION_TEMPERATURE = 0;

let client: OpenAI | undefined;

function getClient() {
  if (!env.OPENAI_API_KEY) {
    throw new Error("OPENAI_API_KEY is required to call OpenAI APIs.");
  }
  client ??= new OpenAI({
    apiKey: env.OPENAI_API_KEY,
    baseURL: env.OPENAI_API_BASE
  });
  return client;
}

export type OpenAIResponseOptions = {
  input: ResponseInput;
  tools?: Tool[];
};

export async function generateResponse({ input, tools }: OpenAIResponseOptions) {
  return getClient().responses.create(
    {
      model: env.OPENAI_MODEL,
      temperature: GENERATION_TEMPERATURE,
      input,
      tools: tools && tools.length > 0 ? tools : undefined,
      stream: false
    },
    { timeout: env.OPENAI_TIMEOUT_MS }
  );
}

/**
 * Runs stage prompts through the Responses API. The docs retriever is served
 * by reading the page up front and handing its text to the model.
 */
export class OpenAIAgentInvoker implements AgentInvoker {
  constructor(private readonly fetcher: ContentFetcher) {}

  async invoke(invocation: AgentInvocation): Promise<AgentReply> {
    const input: ResponseInput = [{ role: "system", content: invocation.systemPrompt }];
    const tools: Tool[] = [];

    for (const tool of invocation.tools) {
      if (tool.type === "docs_retriever") {
        const page = extractPageText(await this.fetcher.fetchText(tool.url));
        input.push({ role: "system", content: `Reference documentation from ${tool.url}:\n${page}` });
      } else {
        tools.push({ type: "web_search_preview" });
      }
    }

    for (const message of invocation.chatHistory) {
      input.push({ role: message.role, content: message.content });
    }
    input.push({ role: "user", content: invocation.userPrompt });

    const response = await generateResponse({ input, tools });
    return { output: response.output_text };
  }
}
