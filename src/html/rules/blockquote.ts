/**
 * Render Rule: Block Quotes
 */

import type { EndBlockEvent, MarkdownEvent, StartBlockEvent } from "../../types";
import { ofKind, type RuleSet } from "../rule-set";

const isBlock = ofKind("startBlock", "endBlock");

export function blockquoteRule() {
  return (rules: RuleSet): void => {
    rules.addRule("blockquote", {
      filter: (event: MarkdownEvent): event is StartBlockEvent | EndBlockEvent =>
        isBlock(event) && event.tag === "blockquote",
      replacement: (event) =>
        event.kind === "startBlock" ? "<blockquote>\n" : "</blockquote>\n",
    });
  };
}
