/**
 * Render - embedding entry point
 * Wires tokenizer, rule set, renderer and assembler for one document.
 * Synchronous, no I/O, and nothing survives the call.
 */

import { z } from "zod";
import { createRuleSet, type RulePlugin } from "./html";
import { assemble, renderEvents } from "./modules";
import { createTokenizer } from "./tokenizer";
import type { RenderResult, Tokenizer } from "./types";
import { FALLBACK_SLUG_PATTERN } from "./utils/generate-slug";

export interface RenderOptions {
  // Any tokenizer yielding the event stream; markdown-it by default
  tokenizer?: Tokenizer;
  // Extra event-to-HTML rules, applied after the built-ins
  plugins?: RulePlugin[];
  // Slug for headings with no sluggable text
  fallbackSlug?: string;
  // Attach notes (e.g. fallback slugs) to the result
  diagnostics?: boolean;
}

const RenderSettingsSchema = z.object({
  fallbackSlug: z
    .string()
    .regex(FALLBACK_SLUG_PATTERN, "fallbackSlug must be lowercase a-z, 0-9 and single hyphens")
    .optional(),
  diagnostics: z.boolean().optional(),
});

/**
 * Render Markdown to HTML and collect the level 1-3 heading table
 *
 * @example
 * render("# Hello 世界")
 * // { ok: true, html: '<h1 id="hello-世界">Hello 世界</h1>\n',
 * //   headings: [{ level: 1, text: "Hello 世界", slug: "hello-世界" }] }
 */
export function render(source: string, options: RenderOptions = {}): RenderResult {
  return assemble(() => {
    const { fallbackSlug, diagnostics } = RenderSettingsSchema.parse({
      fallbackSlug: options.fallbackSlug,
      diagnostics: options.diagnostics,
    });
    const tokenizer = options.tokenizer ?? createTokenizer();
    const rules = createRuleSet(options.plugins);

    return renderEvents(tokenizer.tokenize(source), {
      rules,
      fallbackSlug,
      diagnostics,
    });
  }, options.diagnostics === true);
}
