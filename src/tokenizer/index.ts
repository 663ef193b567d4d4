/**
 * Tokenizer Configuration
 * Adapts markdown-it's token list to the renderer's event stream
 */

import MarkdownIt from "markdown-it";
import type { HeadingLevel, MarkdownEvent, Tokenizer } from "../types";
import { InputError, InvariantViolationError } from "../utils/render-error";

type Token = ReturnType<MarkdownIt["parse"]>[number];

// Constructs without render rules yet. With their markdown-it rules off,
// their source renders as ordinary paragraph text.
export const DISABLED_RULES = [
  "list",
  "code",
  "fence",
  "html_block",
  "reference",
  "link",
  "image",
  "autolink",
  "html_inline",
];

const LONE_SURROGATE = /\p{Cs}/u;

// markdown-it stops parsing a container at this depth and drops its content
export const MAX_NESTING = 100;

function isHeadingLevel(level: number): level is HeadingLevel {
  return Number.isInteger(level) && level >= 1 && level <= 6;
}

function headingLevel(token: Token): HeadingLevel {
  const level = Number(token.tag.slice(1)); // "h2" -> 2
  if (!isHeadingLevel(level)) {
    throw new InvariantViolationError(
      "unsupported-token",
      `Heading token has unexpected tag "${token.tag}"`,
    );
  }
  return level;
}

function unsupported(token: Token): InvariantViolationError {
  return new InvariantViolationError(
    "unsupported-token",
    `No event mapping for markdown-it token "${token.type}"`,
  );
}

function* inlineEvents(tokens: Token[]): Generator<MarkdownEvent> {
  for (const token of tokens) {
    switch (token.type) {
      case "text":
        if (token.content !== "") yield { kind: "text", text: token.content };
        break;
      case "code_inline":
        yield { kind: "code", text: token.content };
        break;
      case "softbreak":
        yield { kind: "softBreak" };
        break;
      case "hardbreak":
        yield { kind: "hardBreak" };
        break;
      case "em_open":
        yield { kind: "startInline", tag: "em" };
        break;
      case "em_close":
        yield { kind: "endInline", tag: "em" };
        break;
      case "strong_open":
        yield { kind: "startInline", tag: "strong" };
        break;
      case "strong_close":
        yield { kind: "endInline", tag: "strong" };
        break;
      default:
        throw unsupported(token);
    }
  }
}

function* blockEvents(tokens: Token[]): Generator<MarkdownEvent> {
  let quoteDepth = 0;

  for (const token of tokens) {
    switch (token.type) {
      case "paragraph_open":
        yield { kind: "startBlock", tag: "p" };
        break;
      case "paragraph_close":
        yield { kind: "endBlock", tag: "p" };
        break;
      case "blockquote_open":
        // The content of a quote at the nesting limit was never parsed
        if (++quoteDepth >= MAX_NESTING) {
          throw new InputError(
            "nesting-too-deep",
            `Block quotes nest deeper than ${MAX_NESTING - 1} levels`,
          );
        }
        yield { kind: "startBlock", tag: "blockquote" };
        break;
      case "blockquote_close":
        quoteDepth -= 1;
        yield { kind: "endBlock", tag: "blockquote" };
        break;
      case "heading_open":
        yield { kind: "startHeading", level: headingLevel(token) };
        break;
      case "heading_close":
        yield { kind: "endHeading", level: headingLevel(token) };
        break;
      case "hr":
        yield { kind: "rule" };
        break;
      case "inline":
        yield* inlineEvents(token.children ?? []);
        break;
      default:
        throw unsupported(token);
    }
  }
}

export class MarkdownItTokenizer implements Tokenizer {
  private md: MarkdownIt;

  constructor() {
    this.md = new MarkdownIt("commonmark", { maxNesting: MAX_NESTING });
    this.md.disable(DISABLED_RULES);
  }

  /**
   * Yield the document's events lazily, in document order
   */
  *tokenize(source: string): Generator<MarkdownEvent> {
    if (LONE_SURROGATE.test(source)) {
      throw new InputError(
        "invalid-encoding",
        "Source contains an unpaired UTF-16 surrogate",
      );
    }
    yield* blockEvents(this.md.parse(source, {}));
  }
}

export function createTokenizer(): Tokenizer {
  return new MarkdownItTokenizer();
}
