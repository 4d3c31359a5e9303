import { describe, expect, it } from "vitest";
import { extractPageText } from "../../src/utils/page-text";

describe("extractPageText", () => {
  it("drops markup, scripts and styles", () => {
    const html = "<html><style>p { color: red; }</style><body><p>Use&nbsp;the <b>API</b> &amp; SDK</p><script>track()</script></body></html>";
    expect(extractPageText(html)).toBe("Use the API & SDK");
  });

  it("clips long pages", () => {
    expect(extractPageText("<p>abcdefgh</p>", 4)).toBe("abcd");
  });
});
