/**
 * Assembler Module
 * Wraps a render into one result value: the output, or a single issue
 */

import { ZodError } from "zod";
import type { RenderIssue, RenderOutput, RenderResult } from "../types";
import { InputError, InvariantViolationError } from "../utils/render-error";

/**
 * Map anything a render threw to a structured issue
 */
export function toRenderIssue(error: unknown): RenderIssue {
  if (error instanceof InputError) {
    return { type: "input", reason: error.reason, details: error.message };
  }
  if (error instanceof InvariantViolationError) {
    return { type: "internal", reason: error.reason, details: error.message };
  }
  if (error instanceof ZodError) {
    return {
      type: "input",
      reason: "invalid-options",
      details: error.issues.map((e) => e.message).join("; "),
    };
  }
  return {
    type: "internal",
    reason: "unexpected-error",
    details: error instanceof Error ? error.message : String(error),
  };
}

/**
 * Run a render and assemble its result.
 * A failure never comes with HTML, partial or otherwise.
 */
export function assemble(
  run: () => RenderOutput,
  includeNotes = false,
): RenderResult {
  let output: RenderOutput;
  try {
    output = run();
  } catch (error) {
    return { ok: false, error: toRenderIssue(error) };
  }

  const { html, headings, notes } = output;
  return includeNotes
    ? { ok: true, html, headings, notes }
    : { ok: true, html, headings };
}
