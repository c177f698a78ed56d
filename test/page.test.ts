import { describe, expect, it } from "vitest";
import { renderPage } from "../src/page.js";

describe("renderPage", () => {
  const base = {
    fileName: "notes.md",
    fullPath: "/docs/notes.md",
    version: 3,
  };

  it("embeds rendered content and the version marker", () => {
    const html = renderPage({
      ...base,
      content: { kind: "rendered", html: "<p>Body</p>" },
    });

    expect(html).toContain('<html lang="en" data-version="3" data-state="ready">');
    expect(html).toContain("<title>mdpeek — notes.md</title>");
    expect(html).toContain('<article id="app" class="markdown-body">\n<p>Body</p>\n');
    expect(html).toContain("<span>Version 3</span>");
    expect(html).toContain("const VERSION = 3;");
    expect(html).toContain("const POLL_INTERVAL_MS = 1000;");
  });

  it("uses the configured poll interval", () => {
    const html = renderPage({
      ...base,
      content: { kind: "pending" },
      pollIntervalMs: 250,
    });

    expect(html).toContain("const POLL_INTERVAL_MS = 250;");
    expect(html).toContain('<p class="placeholder">Waiting for markdown…</p>');
  });

  it("renders an escaped error block", () => {
    const html = renderPage({
      ...base,
      fileName: "<notes>.md",
      content: { kind: "error", message: 'bad "input" <here>' },
    });

    expect(html).toContain('data-state="error"');
    expect(html).toContain("Unable to render &lt;notes&gt;.md</p>");
    expect(html).toContain("<pre>bad &quot;input&quot; &lt;here&gt;</pre>");
    expect(html).not.toContain("<here>");
  });
});
