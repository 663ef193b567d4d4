/**
 * Render Rules Index
 * Exports every built-in event-to-HTML rule
 */

export { paragraphRule } from "./paragraph";
export { blockquoteRule } from "./blockquote";
export { thematicBreakRule } from "./thematic-break";
export { headingTagsRule } from "./heading-tags";
export { emphasisRule } from "./emphasis";
export { codeSpanRule } from "./code-span";
export { textRule } from "./text";
export { lineBreaksRule } from "./line-breaks";

// TODO: Lists, fenced code blocks and links need events from the tokenizer
// adapter first; their markdown-it rules are disabled until then.
