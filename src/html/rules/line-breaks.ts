/**
 * Render Rule: Line Breaks
 * Soft breaks stay newlines, hard breaks become <br>
 */

import { ofKind, type RuleSet } from "../rule-set";

export function lineBreaksRule() {
  return (rules: RuleSet): void => {
    rules.addRule("lineBreaks", {
      filter: ofKind("softBreak", "hardBreak"),
      replacement: (event) => (event.kind === "hardBreak" ? "<br>\n" : "\n"),
    });
  };
}
