/**
 * Render Errors
 * Thrown inside a render call, mapped to a RenderIssue by the assembler
 */

import type { InputIssueReason, InternalIssueReason } from "../types";

export abstract class RenderError extends Error {
  abstract readonly type: "input" | "internal";
}

/**
 * The source was rejected before or during tokenizing
 */
export class InputError extends RenderError {
  readonly type = "input";

  constructor(
    readonly reason: InputIssueReason,
    message: string,
  ) {
    super(message);
    this.name = "InputError";
  }
}

/**
 * A structural impossibility, e.g. a heading close with no open heading.
 * Means a tokenizer broke its contract; never recovered from.
 */
export class InvariantViolationError extends RenderError {
  readonly type = "internal";

  constructor(
    readonly reason: Exclude<InternalIssueReason, "unexpected-error">,
    message: string,
  ) {
    super(message);
    this.name = "InvariantViolationError";
  }
}
