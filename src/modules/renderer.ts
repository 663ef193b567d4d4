/**
 * Renderer Module
 * Consumes the event stream exactly once, writing HTML as it goes and
 * buffering only the open level 1-3 heading until its close event supplies
 * the text its slug is made from.
 */

import type { RuleSet } from "../html";
import type {
  HeadingLevel,
  HeadingRecord,
  MarkdownEvent,
  RenderNote,
  RenderOutput,
  SlugLevel,
} from "../types";
import { escapeHtml } from "../utils/escape-html";
import {
  DEFAULT_FALLBACK_SLUG,
  FALLBACK_SLUG_PATTERN,
  generateSlugCandidate,
} from "../utils/generate-slug";
import { InputError, InvariantViolationError } from "../utils/render-error";
import { SlugTable } from "../utils/slug-table";

export interface RendererOptions {
  rules: RuleSet;
  fallbackSlug?: string;
  diagnostics?: boolean;
}

interface IdleState {
  mode: "idle";
}

interface HeadingState {
  mode: "heading";
  level: SlugLevel;
  text: string[]; // Raw text for the slug
  html: string[]; // Rendered inline content
}

type RendererState = IdleState | HeadingState;

function isSlugLevel(level: HeadingLevel): level is SlugLevel {
  return level <= 3;
}

export function renderEvents(
  events: Iterable<MarkdownEvent>,
  options: RendererOptions,
): RenderOutput {
  // ============================================================================
  // Per-render state (never outlives this call)
  // ============================================================================

  const {
    rules,
    fallbackSlug = DEFAULT_FALLBACK_SLUG,
    diagnostics = false,
  } = options;
  if (!FALLBACK_SLUG_PATTERN.test(fallbackSlug)) {
    throw new InputError(
      "invalid-options",
      `Fallback slug "${fallbackSlug}" is not a valid slug`,
    );
  }
  const slugs = new SlugTable();
  const output: string[] = [];
  const headings: HeadingRecord[] = [];
  const notes: RenderNote[] = [];
  let state: RendererState = { mode: "idle" };

  // ============================================================================
  // Heading close
  // ============================================================================

  function closeHeading(heading: HeadingState): string {
    const text = heading.text.join("");
    const candidate = generateSlugCandidate(text, fallbackSlug);
    const slug = slugs.resolve(candidate.slug);

    headings.push(Object.freeze({ level: heading.level, text, slug }));
    if (diagnostics && candidate.degenerate) {
      notes.push({ type: "degenerate-slug", level: heading.level, text, slug });
    }

    const tag = `h${heading.level}`;
    return `<${tag} id="${escapeHtml(slug)}">${heading.html.join("")}</${tag}>\n`;
  }

  // ============================================================================
  // Single pass
  // ============================================================================

  for (const event of events) {
    if (state.mode === "idle") {
      if (event.kind === "startHeading" && isSlugLevel(event.level)) {
        state = { mode: "heading", level: event.level, text: [], html: [] };
        continue;
      }
      if (event.kind === "endHeading" && isSlugLevel(event.level)) {
        throw new InvariantViolationError(
          "unmatched-heading-close",
          `Closing h${event.level} without an open heading`,
        );
      }
      output.push(rules.render(event));
      continue;
    }

    switch (event.kind) {
      case "startHeading":
        throw new InvariantViolationError(
          "nested-heading",
          `Opening h${event.level} inside an open h${state.level}`,
        );
      case "endHeading":
        if (event.level !== state.level) {
          throw new InvariantViolationError(
            "unmatched-heading-close",
            `Closing h${event.level} while h${state.level} is open`,
          );
        }
        output.push(closeHeading(state));
        state = { mode: "idle" };
        continue;
      case "startBlock":
      case "endBlock":
      case "rule":
        throw new InvariantViolationError(
          "unexpected-event",
          `Block event "${event.kind}" inside an open h${state.level}`,
        );
      case "text":
      case "code":
        state.text.push(event.text);
        break;
      case "softBreak":
      case "hardBreak":
        state.text.push(" ");
        break;
    }

    state.html.push(rules.render(event));
  }

  if (state.mode === "heading") {
    throw new InvariantViolationError(
      "unterminated-heading",
      `Event stream ended inside an open h${state.level}`,
    );
  }

  return { html: output.join(""), headings, notes };
}
