/**
 * Markdown event stream
 * One ordered, single-traversal sequence of structural events per document
 */

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

// Levels that take part in the heading table
export type SlugLevel = 1 | 2 | 3;

export type BlockTag = "p" | "blockquote";
export type InlineTag = "em" | "strong";

export interface StartBlockEvent {
  kind: "startBlock";
  tag: BlockTag;
}

export interface EndBlockEvent {
  kind: "endBlock";
  tag: BlockTag;
}

export interface StartHeadingEvent {
  kind: "startHeading";
  level: HeadingLevel;
}

export interface EndHeadingEvent {
  kind: "endHeading";
  level: HeadingLevel;
}

export interface StartInlineEvent {
  kind: "startInline";
  tag: InlineTag;
}

export interface EndInlineEvent {
  kind: "endInline";
  tag: InlineTag;
}

export interface TextEvent {
  kind: "text";
  text: string;
}

export interface CodeEvent {
  kind: "code";
  text: string;
}

export interface SoftBreakEvent {
  kind: "softBreak";
}

export interface HardBreakEvent {
  kind: "hardBreak";
}

export interface RuleEvent {
  kind: "rule";
}

export type MarkdownEvent =
  | StartBlockEvent
  | EndBlockEvent
  | StartHeadingEvent
  | EndHeadingEvent
  | StartInlineEvent
  | EndInlineEvent
  | TextEvent
  | CodeEvent
  | SoftBreakEvent
  | HardBreakEvent
  | RuleEvent;

export type MarkdownEventKind = MarkdownEvent["kind"];

/**
 * Anything that turns one Markdown source into one event stream.
 * The stream is read exactly once by the renderer.
 */
export interface Tokenizer {
  tokenize(source: string): Iterable<MarkdownEvent>;
}
