/**
 * Render result types
 */

import type { SlugLevel } from "./events";

export interface HeadingRecord {
  readonly level: SlugLevel;
  readonly text: string; // Raw heading text, not HTML-escaped
  readonly slug: string;
}

export interface DegenerateSlugNote {
  type: "degenerate-slug";
  level: SlugLevel;
  text: string;
  slug: string;
}

export type RenderNote = DegenerateSlugNote;

// Type-safe reasons for each issue type
export type InputIssueReason =
  | "invalid-encoding"
  | "input-too-large"
  | "nesting-too-deep"
  | "invalid-options";
export type InternalIssueReason =
  | "unmatched-heading-close"
  | "nested-heading"
  | "unterminated-heading"
  | "unexpected-event"
  | "unsupported-token"
  | "unexpected-error";

export interface InputIssue {
  type: "input";
  reason: InputIssueReason;
  details: string;
}

export interface InternalIssue {
  type: "internal";
  reason: InternalIssueReason;
  details: string;
}

export type RenderIssue = InputIssue | InternalIssue;

/**
 * What the renderer produces before the assembler wraps it
 */
export interface RenderOutput {
  html: string;
  headings: HeadingRecord[];
  notes: RenderNote[];
}

export interface RenderSuccess {
  ok: true;
  html: string;
  headings: HeadingRecord[];
  notes?: RenderNote[];
}

export interface RenderFailure {
  ok: false;
  error: RenderIssue;
}

export type RenderResult = RenderSuccess | RenderFailure;
