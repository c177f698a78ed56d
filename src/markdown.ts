import type { Tokens } from "marked";
import { marked } from "marked";
import { emojify } from "node-emoji";
import sanitizeHtml from "sanitize-html";
import { describeError, RenderError } from "./errors.js";
import { escapeHtml } from "./html.js";

marked.setOptions({
  gfm: true,
  breaks: true,
});

type TokensList = ReturnType<typeof marked.lexer>;

const SANITIZE_OPTIONS: sanitizeHtml.IOptions = {
  allowedTags: [
    "h1",
    "h2",
    "h3",
    "h4",
    "h5",
    "h6",
    "p",
    "div",
    "span",
    "br",
    "hr",
    "blockquote",
    "pre",
    "code",
    "kbd",
    "samp",
    "em",
    "strong",
    "b",
    "i",
    "u",
    "s",
    "del",
    "ins",
    "mark",
    "sub",
    "sup",
    "small",
    "abbr",
    "a",
    "img",
    "ul",
    "ol",
    "li",
    "dl",
    "dt",
    "dd",
    "table",
    "caption",
    "colgroup",
    "col",
    "thead",
    "tbody",
    "tfoot",
    "tr",
    "th",
    "td",
    "details",
    "summary",
    "figure",
    "figcaption",
    "input",
  ],
  allowedAttributes: {
    "*": ["id", "class", "title", "lang", "dir", "align"],
    a: ["href", "name", "rel"],
    img: ["src", "alt", "width", "height"],
    input: ["type", "checked", "disabled"],
    ol: ["start"],
    th: ["colspan", "rowspan"],
    td: ["colspan", "rowspan"],
    details: ["open"],
    span: ["aria-hidden"],
  },
  allowedSchemes: ["http", "https", "mailto"],
  allowProtocolRelative: false,
};

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Renders markdown to an HTML fragment. Raw HTML embedded in the source is
 * reduced to an allow-list, so scripts, frames, inline styles and event
 * handlers never reach the preview page.
 */
export function renderMarkdown(markdown: string): string {
  const renderer = new marked.Renderer();
  const usedIds = new Map<string, number>();

  renderer.heading = ({ tokens, depth, text }) => {
    const base =
      text
        .toLowerCase()
        .trim()
        .replace(/\s+/g, "-")
        .replace(/[^a-z0-9_-]/g, "")
        .replace(/-{2,}/g, "-")
        .replace(/^-+|-+$/g, "") || "section";
    const repeats = usedIds.get(base) ?? 0;
    usedIds.set(base, repeats + 1);
    const slug = repeats === 0 ? base : `${base}-${repeats}`;
    const content = renderer.parser.parseInline(tokens);
    return `<h${depth} id="${slug}">${content}</h${depth}>\n`;
  };

  const originalBlockquote = renderer.blockquote.bind(renderer);
  renderer.blockquote = (token) => {
    const callout = parseCallout(token);
    if (!callout) {
      return originalBlockquote(token);
    }

    const bodyHtml =
      callout.bodyTokens.length > 0
        ? renderer.parser.parse(callout.bodyTokens)
        : "";

    const body =
      bodyHtml.trim().length > 0
        ? `\n<div class="callout-content">\n${bodyHtml}</div>`
        : "";

    return `<div class="callout callout-${callout.variant}">
<p class="callout-title"><span class="callout-icon" aria-hidden="true">${escapeHtml(callout.icon)}</span> ${escapeHtml(callout.title)}</p>${body}
</div>
`;
  };

  // Only leaf text is emojified: a text token with children (tight list
  // items) renders them inline, and those include code spans and links.
  const originalText = renderer.text.bind(renderer);
  renderer.text = (token) => {
    if ("tokens" in token && token.tokens) {
      return renderer.parser.parseInline(token.tokens);
    }
    return emojify(originalText(token));
  };

  const html = marked.parse(markdown, { async: false, renderer }) as string;
  return sanitizeHtml(html, SANITIZE_OPTIONS);
}

/**
 * Decodes raw file bytes and renders them. Anything that stops the bytes
 * from becoming HTML surfaces as a {@link RenderError}.
 */
export function renderSource(content: Uint8Array): string {
  let markdown: string;
  try {
    markdown = utf8.decode(content);
  } catch (error) {
    throw new RenderError("Source is not valid UTF-8 text.", { cause: error });
  }

  try {
    return renderMarkdown(markdown);
  } catch (error) {
    throw new RenderError(`Unable to render markdown: ${describeError(error)}`, {
      cause: error,
    });
  }
}

interface CalloutMatch {
  variant: string;
  title: string;
  icon: string;
  bodyTokens: TokensList;
}

/** Alert kind → default title and icon. */
const CALLOUTS = new Map<string, readonly [title: string, icon: string]>([
  ["note", ["Note", "ℹ️"]],
  ["tip", ["Tip", "💡"]],
  ["important", ["Important", "❗"]],
  ["warning", ["Warning", "⚠️"]],
  ["caution", ["Caution", "⚠️"]],
]);

function parseCallout(token: Tokens.Blockquote): CalloutMatch | undefined {
  const lines = token.raw.split(/\n/).map((line) => line.replace(/^> ?/, ""));
  const [firstLine, ...rest] = lines;
  const match = firstLine?.trim().match(/^\[!(\w+)\](?:\s+(.*))?$/);
  if (!match?.[1]) {
    return undefined;
  }

  const variant = match[1].toLowerCase();
  const defaults = CALLOUTS.get(variant);
  if (!defaults) {
    return undefined;
  }

  const [defaultTitle, icon] = defaults;
  return {
    variant,
    title: match[2]?.trim() || defaultTitle,
    icon,
    bodyTokens: marked.lexer(rest.join("\n").trim()),
  };
}
