import type { ScoredChunk, TargetModel } from "@collabrag/types";

export const NO_CONTEXT_MARKER = "No relevant context was found in the knowledge base.";

const INSTRUCTIONS =
  "Answer the question using only the documents in the knowledge base below. " +
  "If they do not contain enough information to answer it, say so. Do not make anything up.";

export interface PromptOptions {
  targetModel: TargetModel;
  /** Upper bound on the length of the whole prompt. */
  maxChars: number;
}

export interface AssembledPrompt {
  prompt: string;
  /** Leading chunks that fit in the prompt. */
  included: ScoredChunk[];
}

/**
 * Model-agnostic context formatting.
 * Assembles retrieved chunks into a format optimized for the target model.
 *
 * - XML (Claude): Uses XML tags for structured context
 * - Markdown (GPT): Uses markdown formatting
 * - Plain (Gemini/Generic): Simple numbered sections
 */
export function assembleContext(chunks: ScoredChunk[], targetModel: TargetModel): string {
  if (chunks.length === 0) return "";

  switch (targetModel) {
    case "claude":
      return assembleXml(chunks);
    case "gpt":
      return assembleMarkdown(chunks);
    case "gemini":
    case "generic":
    default:
      return assemblePlain(chunks);
  }
}

/**
 * Build the answering prompt. Chunks are added in order while the whole prompt
 * stays within `maxChars`; the first chunk that does not fit ends the context,
 * so chunks are dropped whole and never cut.
 */
export function assemblePrompt(
  question: string,
  chunks: ScoredChunk[],
  options: PromptOptions,
): AssembledPrompt {
  let included: ScoredChunk[] = [];
  let prompt = renderPrompt(question, NO_CONTEXT_MARKER);

  for (const chunk of chunks) {
    const candidate = [...included, chunk];
    const next = renderPrompt(question, assembleContext(candidate, options.targetModel));
    if (next.length > options.maxChars) break;
    included = candidate;
    prompt = next;
  }

  return { prompt, included };
}

function renderPrompt(question: string, context: string): string {
  return `${INSTRUCTIONS}\n\nKnowledge base:\n${context}\n\nQuestion: ${question}\n\nAnswer:`;
}

function escapeAttribute(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/"/g, "&quot;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

function assembleXml(chunks: ScoredChunk[]): string {
  const parts = chunks.map(({ chunk }, i) => {
    const { source, title, url } = chunk.metadata;
    const attributes = [
      `index="${String(i + 1)}"`,
      `source="${source}"`,
      `title="${escapeAttribute(title)}"`,
      ...(url ? [`url="${escapeAttribute(url)}"`] : []),
    ];
    return `<document ${attributes.join(" ")}>\n${chunk.text}\n</document>`;
  });

  return `<context>\n${parts.join("\n")}\n</context>`;
}

function assembleMarkdown(chunks: ScoredChunk[]): string {
  const parts = chunks.map(({ chunk }, i) => {
    const { source, title, url } = chunk.metadata;
    const origin = url ? `${source}, ${url}` : source;
    return `### Source ${String(i + 1)}: ${title} (${origin})\n\n${chunk.text}`;
  });

  return `## Retrieved Context\n\n${parts.join("\n\n---\n\n")}`;
}

function assemblePlain(chunks: ScoredChunk[]): string {
  const parts = chunks.map(({ chunk }, i) => {
    const { source, title, url } = chunk.metadata;
    const attribution = url
      ? `Source: ${source}, Title: ${title}, URL: ${url}`
      : `Source: ${source}, Title: ${title}`;
    return `[${String(i + 1)}] (${attribution})\n${chunk.text}`;
  });

  return parts.join("\n\n");
}
