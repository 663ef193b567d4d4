/**
 * Utility exports
 */

// Slug utilities
export { isCjk, cjkScriptOf, CJK_UNICODE_VERSION } from "./is-cjk";
export type { CjkScript } from "./is-cjk";
export { classifyChar, foldChar } from "./classify-char";
export type { CharClass } from "./classify-char";
export {
  generateSlug,
  generateSlugCandidate,
  DEFAULT_FALLBACK_SLUG,
  FALLBACK_SLUG_PATTERN,
} from "./generate-slug";
export type { SlugCandidate } from "./generate-slug";

// HTML utilities
export { escapeHtml } from "./escape-html";

// Errors
export {
  RenderError,
  InputError,
  InvariantViolationError,
} from "./render-error";

// Input/output utilities
export { readSource, decodeSource } from "./read-input";
export { formatRenderResult, formatIssue } from "./format-output";

// Config utilities
export {
  loadConfig,
  loadDefaultConfig,
  loadPartialConfig,
  mergeConfig,
  mapConfigError,
  getUserConfigPath,
} from "./load-config";

// Template utilities
export { loadTocTemplate, getDefaultTocTemplate } from "./toc-template";
export type { TocTemplateContext } from "./toc-template";

// Classes
export { SlugTable } from "./slug-table";
export { Logger } from "./logger";
