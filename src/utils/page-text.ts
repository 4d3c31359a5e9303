export const PAGE_TEXT_LIMIT = 12_000;

const ENTITIES: Record<string, string> = {
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": '"',
  "&#39;": "'",
  "&nbsp;": " "
};

/**
 * Readable text of an HTML page, truncated to its first `limit` characters.
 * Text past the cut is not sent to the agent.
 */
export function extractPageText(html: string, limit = PAGE_TEXT_LIMIT) {
  const text = html
    .replace(/<(script|style|noscript)[^>]*>[\s\S]*?<\/\1>/gi, " ")
    .replace(/<[^>]+>/g, " ")
    .replace(/&(amp|lt|gt|quot|#39|nbsp);/g, (entity) => ENTITIES[entity] ?? entity)
    .replace(/\s+/g, " ")
    .trim();
  return text.length > limit ? text.slice(0, limit) : text;
}
