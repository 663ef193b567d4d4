/**
 * Render Rule: Paragraphs
 */

import type { EndBlockEvent, MarkdownEvent, StartBlockEvent } from "../../types";
import { ofKind, type RuleSet } from "../rule-set";

const isBlock = ofKind("startBlock", "endBlock");

export function paragraphRule() {
  return (rules: RuleSet): void => {
    rules.addRule("paragraph", {
      filter: (event: MarkdownEvent): event is StartBlockEvent | EndBlockEvent =>
        isBlock(event) && event.tag === "p",
      replacement: (event) => (event.kind === "startBlock" ? "<p>" : "</p>\n"),
    });
  };
}
