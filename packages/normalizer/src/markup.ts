/**
 * Plain-text extraction for the markup formats the sources deliver:
 * HTML / Confluence storage XHTML and Atlassian Document Format (ADF).
 */

const BLOCK_TAGS =
  /<\/?(p|div|br|li|ul|ol|h[1-6]|tr|td|th|dt|dd|table|thead|tbody|blockquote|pre|hr|section|article|ac:task)\b[^>]*>/gi;

const NAMED_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: " ",
  ndash: "–",
  mdash: "—",
  hellip: "…",
};

export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#[0-9]+|[a-z]+);/gi, (match, entity: string) => {
    if (entity.startsWith("#x") || entity.startsWith("#X")) {
      return safeFromCodePoint(parseInt(entity.slice(2), 16), match);
    }
    if (entity.startsWith("#")) {
      return safeFromCodePoint(parseInt(entity.slice(1), 10), match);
    }
    return NAMED_ENTITIES[entity.toLowerCase()] ?? match;
  });
}

function safeFromCodePoint(codePoint: number, fallback: string): string {
  if (!Number.isFinite(codePoint) || codePoint < 0 || codePoint > 0x10ffff) return fallback;
  return String.fromCodePoint(codePoint);
}

/**
 * Collapse runs of horizontal whitespace, trim every line and drop blank lines.
 */
export function normalizeWhitespace(text: string): string {
  return text
    .split("\n")
    .map((line) => line.replace(/[ \t\f\v\r\u00a0]+/g, " ").trim())
    .filter((line) => line.length > 0)
    .join("\n");
}

export function stripHtml(html: string): string {
  const text = html
    .replace(/<!\[CDATA\[([\s\S]*?)\]\]>/g, "$1")
    .replace(/<script[^>]*>[\s\S]*?<\/script>/gi, "")
    .replace(/<style[^>]*>[\s\S]*?<\/style>/gi, "")
    .replace(/<!--[\s\S]*?-->/g, "")
    .replace(BLOCK_TAGS, "\n")
    .replace(/<[^>]+>/g, "");

  return normalizeWhitespace(decodeEntities(text));
}

const ADF_BLOCK_TYPES: ReadonlySet<string> = new Set([
  "paragraph",
  "heading",
  "bulletList",
  "orderedList",
  "listItem",
  "codeBlock",
  "blockquote",
  "panel",
  "rule",
  "table",
  "tableRow",
  "tableCell",
  "tableHeader",
  "mediaSingle",
]);

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function collectAdf(node: unknown, out: string[]): void {
  if (Array.isArray(node)) {
    for (const child of node) collectAdf(child, out);
    return;
  }
  if (!isRecord(node)) return;

  const type = node["type"];
  const attrs = isRecord(node["attrs"]) ? node["attrs"] : {};

  if (type === "text" && typeof node["text"] === "string") {
    out.push(node["text"]);
  } else if (type === "hardBreak") {
    out.push("\n");
  } else if (type === "mention" && typeof attrs["text"] === "string") {
    out.push(attrs["text"]);
  } else if (type === "emoji" && typeof attrs["shortName"] === "string") {
    out.push(attrs["shortName"]);
  } else if ((type === "inlineCard" || type === "blockCard") && typeof attrs["url"] === "string") {
    out.push(attrs["url"]);
  }

  if ("content" in node) collectAdf(node["content"], out);
  if (typeof type === "string" && ADF_BLOCK_TYPES.has(type)) out.push("\n");
}

/**
 * Plain text of an ADF document. Strings (Jira's v2 plain-text fields) pass
 * through; anything else yields "".
 */
export function adfToText(value: unknown): string {
  if (typeof value === "string") return normalizeWhitespace(value);
  if (!isRecord(value) && !Array.isArray(value)) return "";

  const out: string[] = [];
  collectAdf(value, out);
  return normalizeWhitespace(out.join(""));
}
