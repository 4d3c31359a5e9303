import { z } from "zod";

export const MISSING_FILE_CONTENT = "Content not found or not in base64 encoding.";

export interface ContentFetcher {
  /** Body of a web page, as text, whatever the response status. */
  fetchText(url: string): Promise<string>;
  /** Decoded content of a repository file served as a base64 JSON envelope. */
  fetchRepositoryFile(url: string): Promise<string>;
}

const fileEnvelopeSchema = z.object({
  content: z.string(),
  encoding: z.literal("base64")
});

export function decodeFileEnvelope(body: string): string {
  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch {
    return MISSING_FILE_CONTENT;
  }

  const envelope = fileEnvelopeSchema.safeParse(payload);
  if (!envelope.success) {
    return MISSING_FILE_CONTENT;
  }
  return Buffer.from(envelope.data.content, "base64").toString("utf8");
}

export type HttpContentFetcherOptions = {
  githubToken?: string;
  fetchImpl?: typeof fetch;
};

export class HttpContentFetcher implements ContentFetcher {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: HttpContentFetcherOptions = {}) {
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async fetchText(url: string) {
    // Non-2xx bodies are returned as well.
    const response = await this.fetchImpl(url);
    return response.text();
  }

  async fetchRepositoryFile(url: string) {
    const headers: Record<string, string> = { Accept: "application/vnd.github+json" };
    if (this.options.githubToken) {
      headers.Authorization = `Bearer ${this.options.githubToken}`;
    }
    // Error bodies are not envelopes either and decode to the sentinel.
    const response = await this.fetchImpl(url, { headers });
    return decodeFileEnvelope(await response.text());
  }
}
