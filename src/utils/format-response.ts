const FENCE_OPENING = /```(python|jsx)\n?/g;
const FENCE = /```/g;

/** Strips code-fence markers from agent output, leaving the code between them untouched. */
export function formatResponse(text: string): string {
  return text.replace(FENCE_OPENING, "").replace(FENCE, "");
}
