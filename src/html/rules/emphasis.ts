/**
 * Render Rule: Emphasis and Strong Emphasis
 */

import { ofKind, type RuleSet } from "../rule-set";
import type { StartInlineEvent, EndInlineEvent } from "../../types";

export function emphasisRule() {
  return (rules: RuleSet): void => {
    rules.addRule<StartInlineEvent | EndInlineEvent>("emphasis", {
      filter: ofKind("startInline", "endInline"),
      replacement: (event) =>
        event.kind === "startInline" ? `<${event.tag}>` : `</${event.tag}>`,
    });
  };
}
