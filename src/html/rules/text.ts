import { escapeHtml } from "../../utils/escape-html";
import { ofKind, type RuleSet } from "../rule-set";
import type { TextEvent } from "../../types";

export function textRule() {
  return (rules: RuleSet): void => {
    rules.addRule<TextEvent>("text", {
      filter: ofKind("text"),
      replacement: (event) => escapeHtml(event.text),
    });
  };
}
