import { load } from "cheerio";
import { hasChildren, isText, type AnyNode } from "domhandler";
import type { LeaderName, Snippet } from "./types.js";

/** Human-readable containers whose text is searched for leader mentions. */
export const TEXT_BLOCK_SELECTOR = "p, div, span, li, article, blockquote";
export const HIDDEN_SELECTOR = "script, style, noscript, template";
export const MIN_BLOCK_LENGTH = 15;
export const FALLBACK_WINDOW = 200;

const SENTENCE_BOUNDARY = /(?<=[.!?])\s+/;

export interface ExtractOptions {
  selector?: string;
  minBlockLength?: number;
  fallbackWindow?: number;
}

export function extractSnippets(
  markup: string,
  leaders: readonly LeaderName[],
  options: ExtractOptions = {}
): Snippet[] {
  const needles = leaders.map((leader) => leader.toLowerCase()).filter(Boolean);
  if (!needles.length) {
    return [];
  }
  const mentionsLeader = (text: string) => {
    const lower = text.toLowerCase();
    return needles.some((needle) => lower.includes(needle));
  };

  const $ = load(markup);
  $(HIDDEN_SELECTOR).remove();

  const minLength = options.minBlockLength ?? MIN_BLOCK_LENGTH;
  const snippets: Snippet[] = [];
  for (const element of $(options.selector ?? TEXT_BLOCK_SELECTOR).toArray()) {
    const text = visibleText([element]);
    if (Array.from(text).length < minLength || !mentionsLeader(text)) {
      continue;
    }
    for (const sentence of splitSentences(text)) {
      if (mentionsLeader(sentence)) {
        snippets.push({ text: sentence.trim(), context: text });
      }
    }
  }
  if (snippets.length) {
    return snippets;
  }

  const full = visibleText($.root().toArray());
  return windowAroundMentions(full, needles, options.fallbackWindow ?? FALLBACK_WINDOW);
}

export function splitSentences(text: string): string[] {
  return text.split(SENTENCE_BOUNDARY);
}

/** Text of every descendant text node, joined by single spaces. */
export function visibleText(nodes: AnyNode[]): string {
  const parts: string[] = [];
  collectText(nodes, parts);
  return parts.join(" ").replace(/\s+/g, " ").trim();
}

function collectText(nodes: AnyNode[], parts: string[]) {
  for (const node of nodes) {
    if (isText(node)) {
      const trimmed = node.data.trim();
      if (trimmed) {
        parts.push(trimmed);
      }
    } else if (hasChildren(node)) {
      collectText(node.children, parts);
    }
  }
}

// Window bounds count code points.
function windowAroundMentions(full: string, needles: string[], radius: number): Snippet[] {
  const lower = full.toLowerCase();
  const chars = Array.from(full);
  const snippets: Snippet[] = [];
  for (const needle of needles) {
    const offset = lower.indexOf(needle);
    if (offset === -1) {
      continue;
    }
    const index = Array.from(lower.slice(0, offset)).length;
    const start = Math.max(0, index - radius);
    const end = Math.min(chars.length, index + radius);
    const span = chars.slice(start, end).join("").trim();
    snippets.push({ text: span, context: span });
  }
  return snippets;
}
