import { escapeHtml } from "./html.js";

export const DEFAULT_CLIENT_POLL_MS = 1000;

export type PageContent =
  | { kind: "pending" }
  | { kind: "rendered"; html: string }
  | { kind: "error"; message: string };

export interface PageOptions {
  fileName: string;
  fullPath: string;
  version: number;
  content: PageContent;
  pollIntervalMs?: number;
}

/**
 * Wraps a rendered fragment in the preview page: stylesheet, version marker
 * and the script that polls `/updates` and reloads once a newer version
 * has been committed.
 */
export function renderPage(options: PageOptions): string {
  const { content, version } = options;
  const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_CLIENT_POLL_MS;
  const fileName = escapeHtml(options.fileName);
  const fullPath = escapeHtml(options.fullPath);
  const state = content.kind === "error" ? "error" : "ready";

  return `<!DOCTYPE html>
<html lang="en" data-version="${version}" data-state="${state}">
  <head>
    <meta charset="utf-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1" />
    <title>mdpeek — ${fileName}</title>
    <style>
${STYLESHEET}
    </style>
  </head>
  <body>
    <main>
      <header>
        <h1>Previewing <code>${fileName}</code></h1>
        <button id="theme-toggle" type="button">Toggle theme</button>
      </header>
      <p id="status" hidden></p>
      <article id="app" class="markdown-body">
${renderContent(content, fileName)}
      </article>
      <footer>
        <span title="${fullPath}">${fullPath}</span>
        <span>Version ${version}</span>
      </footer>
    </main>
    <script type="module">
${clientScript(version, pollIntervalMs)}
    </script>
  </body>
</html>
`;
}

function renderContent(content: PageContent, fileName: string): string {
  switch (content.kind) {
    case "pending": {
      return `<p class="placeholder">Waiting for markdown…</p>`;
    }
    case "rendered": {
      return content.html;
    }
    case "error": {
      return `<div class="render-error" role="alert">
  <p class="render-error-title">Unable to render ${fileName}</p>
  <pre>${escapeHtml(content.message)}</pre>
</div>`;
    }
  }
}

function clientScript(version: number, pollIntervalMs: number): string {
  return `      const STORAGE_KEY = "mdpeek-theme";
      const POLL_INTERVAL_MS = ${pollIntervalMs};
      const VERSION = ${version};
      const prefersDark = window.matchMedia("(prefers-color-scheme: dark)");
      const status = document.getElementById("status");
      const themeToggle = document.getElementById("theme-toggle");

      const applyTheme = (theme) => {
        document.body.dataset.theme = theme;
        themeToggle.textContent = theme === "dark" ? "Switch to light" : "Switch to dark";
      };

      const storedTheme = window.localStorage.getItem(STORAGE_KEY);
      applyTheme(storedTheme ?? (prefersDark.matches ? "dark" : "light"));

      prefersDark.addEventListener("change", (event) => {
        if (!window.localStorage.getItem(STORAGE_KEY)) {
          applyTheme(event.matches ? "dark" : "light");
        }
      });

      themeToggle.addEventListener("click", () => {
        const nextTheme = document.body.dataset.theme === "dark" ? "light" : "dark";
        applyTheme(nextTheme);
        window.localStorage.setItem(STORAGE_KEY, nextTheme);
      });

      const poll = async () => {
        try {
          const response = await fetch("/updates?since=" + VERSION, { cache: "no-store" });
          if (response.status === 200) {
            window.location.reload();
            return;
          }
          status.hidden = true;
        } catch {
          status.hidden = false;
          status.textContent = "Reconnecting…";
        }
        setTimeout(poll, POLL_INTERVAL_MS);
      };

      setTimeout(poll, POLL_INTERVAL_MS);`;
}

const STYLESHEET = `      :root {
        color-scheme: light dark;
        font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", system-ui, sans-serif;
      }

      body {
        margin: 0;
        background: var(--bg-color);
        color: var(--text-color);
      }

      body[data-theme="light"] {
        --bg-color: #ffffff;
        --text-color: #1f2328;
        --muted-color: #57606a;
        --code-bg: #f6f8fa;
        --border-color: #d0d7de;
        --link-color: #0969da;
        --table-stripe: #f6f8fa;
        --error-color: #cf222e;
      }

      body[data-theme="dark"] {
        --bg-color: #0d1117;
        --text-color: #e6edf3;
        --muted-color: #9ea7b3;
        --code-bg: #161b22;
        --border-color: #30363d;
        --link-color: #4493f8;
        --table-stripe: #161b22;
        --error-color: #f85149;
      }

      main {
        box-sizing: border-box;
        min-width: 200px;
        max-width: 980px;
        margin: 0 auto;
        padding: 45px;
      }

      header {
        display: flex;
        gap: 0.75rem;
        align-items: center;
        justify-content: space-between;
        margin-bottom: 1.5rem;
      }

      header h1 {
        font-size: 1rem;
        font-weight: 600;
        margin: 0;
        color: var(--muted-color);
      }

      header button {
        border: 1px solid var(--border-color);
        background: transparent;
        color: inherit;
        font: inherit;
        padding: 0.35rem 0.75rem;
        border-radius: 999px;
        cursor: pointer;
      }

      #status {
        font-size: 0.85rem;
        color: var(--muted-color);
      }

      .markdown-body {
        font-size: 16px;
        line-height: 1.6;
        word-wrap: break-word;
      }

      .markdown-body h1,
      .markdown-body h2 {
        padding-bottom: 0.3em;
        border-bottom: 1px solid var(--border-color);
      }

      .markdown-body a {
        color: var(--link-color);
        text-decoration: none;
      }

      .markdown-body a:hover {
        text-decoration: underline;
      }

      .markdown-body code {
        font-family: "SFMono-Regular", "Consolas", "Liberation Mono", monospace;
        font-size: 0.9em;
      }

      .markdown-body :not(pre) > code {
        background: var(--code-bg);
        padding: 0.2rem 0.4rem;
        border-radius: 0.3rem;
      }

      .markdown-body pre {
        background: var(--code-bg);
        border: 1px solid var(--border-color);
        border-radius: 0.5rem;
        padding: 1rem;
        overflow: auto;
      }

      .markdown-body blockquote {
        margin: 0;
        padding: 0 1em;
        border-left: 0.25em solid var(--border-color);
        color: var(--muted-color);
      }

      .markdown-body table {
        border-collapse: collapse;
        margin: 1.5rem 0;
        max-width: 100%;
        overflow: auto;
      }

      .markdown-body th,
      .markdown-body td {
        padding: 0.4rem 0.9rem;
        border: 1px solid var(--border-color);
      }

      .markdown-body tbody tr:nth-child(2n) {
        background: var(--table-stripe);
      }

      .markdown-body img {
        max-width: 100%;
      }

      .callout {
        margin: 1.25rem 0;
        border-left: 0.25rem solid var(--callout-accent, var(--link-color));
        padding: 0.75rem 1rem;
        border-radius: 0.5rem;
        background: var(--code-bg);
      }

      .callout-title {
        margin: 0 0 0.45rem;
        font-weight: 600;
        color: var(--callout-accent, var(--link-color));
      }

      .callout-tip { --callout-accent: #1a7f37; }
      .callout-important { --callout-accent: #8250df; }
      .callout-warning { --callout-accent: #bf8700; }
      .callout-caution { --callout-accent: #cf222e; }

      .render-error {
        border: 1px solid var(--error-color);
        border-radius: 0.5rem;
        padding: 1rem;
      }

      .render-error-title {
        margin-top: 0;
        font-weight: 600;
        color: var(--error-color);
      }

      .placeholder {
        color: var(--muted-color);
      }

      footer {
        margin-top: 2.5rem;
        color: var(--muted-color);
        font-size: 0.8rem;
        display: flex;
        justify-content: space-between;
        gap: 1rem;
      }

      footer span {
        overflow: hidden;
        text-overflow: ellipsis;
        white-space: nowrap;
      }`;
