/**
 * mdanchor - library entry point
 */

export { render } from "./render";
export type { RenderOptions } from "./render";

export { createTokenizer, MarkdownItTokenizer } from "./tokenizer";
export { createRuleSet, RuleSet, ofKind } from "./html";
export type { RenderRule, RulePlugin } from "./html";
export { renderEvents, assemble, toRenderIssue } from "./modules";
export type { RendererOptions } from "./modules";

export {
  generateSlug,
  generateSlugCandidate,
  DEFAULT_FALLBACK_SLUG,
  SlugTable,
  isCjk,
  cjkScriptOf,
  classifyChar,
  escapeHtml,
  CJK_UNICODE_VERSION,
  RenderError,
  InputError,
  InvariantViolationError,
} from "./utils";
export type { CjkScript, CharClass, SlugCandidate } from "./utils";

export type * from "./types";
