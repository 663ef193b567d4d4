/**
 * Output Formatting
 * Turns render results into what the CLI writes
 */

import type { OutputConfig, RenderIssue, RenderSuccess } from "../types";

/**
 * Format a successful render as bare HTML or as a JSON document
 *
 * @example
 * formatRenderResult(result, { format: "json", pretty: false })
 * // '{"html":"<h1 id=\"a\">A</h1>\n","headings":[{"level":1,"text":"A","slug":"a"}]}\n'
 */
export function formatRenderResult(
  result: RenderSuccess,
  output: OutputConfig,
): string {
  if (output.format === "html") {
    return result.html;
  }

  const document = {
    html: result.html,
    headings: result.headings.map(({ level, text, slug }) => ({ level, text, slug })),
    ...(result.notes ? { notes: result.notes } : {}),
  };
  return `${JSON.stringify(document, null, output.pretty ? 2 : undefined)}\n`;
}

/**
 * One-line diagnostic for a failed render
 *
 * @example
 * formatIssue({ type: "input", reason: "invalid-encoding", details: "bad byte" })
 * // "error [input/invalid-encoding]: bad byte"
 */
export function formatIssue(issue: RenderIssue): string {
  return `error [${issue.type}/${issue.reason}]: ${issue.details}`;
}
