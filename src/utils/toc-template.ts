/**
 * Table of Contents Templates
 * Renders the heading table through Handlebars
 */

import Handlebars from "handlebars";
import { readFile } from "fs/promises";
import type { HeadingRecord } from "../types";

// Two spaces per level below 1, for nested Markdown lists
Handlebars.registerHelper("indent", (level: unknown) =>
  "  ".repeat(Math.max(0, Number(level) - 1)),
);

// Backslash-escape what would end or nest the link text
export function escapeLinkText(text: string): string {
  return text.replace(/[\\[\]]/g, "\\$&");
}

Handlebars.registerHelper("linkText", (text: unknown) => escapeLinkText(String(text)));

export interface TocTemplateContext {
  headings: HeadingRecord[];
}

/**
 * Built-in template: a nested Markdown list linking each heading's slug
 */
export function getDefaultTocTemplate(): string {
  return `{{#each headings}}
{{indent level}}- [{{{linkText text}}}](#{{{slug}}})
{{/each}}
`;
}

/**
 * Load and compile a template from file path or use the default
 * Throws if a custom template fails to load
 */
export async function loadTocTemplate(
  templatePath: string | null,
): Promise<Handlebars.TemplateDelegate<TocTemplateContext>> {
  if (templatePath === null) {
    return Handlebars.compile<TocTemplateContext>(getDefaultTocTemplate());
  }

  const templateContent = await readFile(templatePath, "utf-8");
  return Handlebars.compile<TocTemplateContext>(templateContent);
}
