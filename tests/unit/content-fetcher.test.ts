import { describe, expect, it, vi } from "vitest";
import {
  HttpContentFetcher,
  MISSING_FILE_CONTENT,
  decodeFileEnvelope
} from "../../src/services/content-fetcher";

function envelope(text: string) {
  return JSON.stringify({ content: Buffer.from(text, "utf8").toString("base64"), encoding: "base64" });
}

describe("decodeFileEnvelope", () => {
  it("decodes base64 content as utf-8", () => {
    expect(decodeFileEnvelope(envelope("export const answer = 42;\n"))).toBe("export const answer = 42;\n");
  });

  it("returns the sentinel for other encodings", () => {
    expect(decodeFileEnvelope(JSON.stringify({ content: "abc", encoding: "utf-8" }))).toBe(MISSING_FILE_CONTENT);
  });

  it("returns the sentinel for bodies that are not JSON", () => {
    expect(decodeFileEnvelope("<html>Not Found</html>")).toBe(MISSING_FILE_CONTENT);
  });

  it("returns the sentinel when content is missing", () => {
    expect(decodeFileEnvelope(JSON.stringify({ message: "Not Found" }))).toBe(MISSING_FILE_CONTENT);
  });
});

describe("HttpContentFetcher", () => {
  it("sends the token and decodes repository files", async () => {
    const fetchImpl = vi.fn(async () => new Response(envelope("body { color: red; }")));
    const fetcher = new HttpContentFetcher({ githubToken: "test-token", fetchImpl });

    const content = await fetcher.fetchRepositoryFile("https://api.example.test/repos/acme/web/contents/app.css");

    expect(content).toBe("body { color: red; }");
    expect(fetchImpl).toHaveBeenCalledWith("https://api.example.test/repos/acme/web/contents/app.css", {
      headers: { Accept: "application/vnd.github+json", Authorization: "Bearer test-token" }
    });
  });

  it("maps a failed repository fetch to the sentinel", async () => {
    const fetchImpl = vi.fn(async () => new Response(JSON.stringify({ message: "Not Found" }), { status: 404 }));
    const fetcher = new HttpContentFetcher({ fetchImpl });

    await expect(fetcher.fetchRepositoryFile("https://api.example.test/missing")).resolves.toBe(MISSING_FILE_CONTENT);
  });

  it("returns the body of a forbidden page", async () => {
    const fetchImpl = vi.fn(async () => new Response("<p>Access denied</p>", { status: 403 }));
    const fetcher = new HttpContentFetcher({ fetchImpl });

    await expect(fetcher.fetchText("https://docs.example.test/api")).resolves.toBe("<p>Access denied</p>");
  });

  it("returns page bodies as text", async () => {
    const fetchImpl = vi.fn(async () => new Response("<h1>API</h1>"));
    const fetcher = new HttpContentFetcher({ fetchImpl });

    await expect(fetcher.fetchText("https://docs.example.test/api")).resolves.toBe("<h1>API</h1>");
  });
});
