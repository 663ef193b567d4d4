import { escapeHtml } from "../../utils/escape-html";
import { ofKind, type RuleSet } from "../rule-set";
import type { CodeEvent } from "../../types";

export function codeSpanRule() {
  return (rules: RuleSet): void => {
    rules.addRule<CodeEvent>("codeSpan", {
      filter: ofKind("code"),
      replacement: (event) => `<code>${escapeHtml(event.text)}</code>`,
    });
  };
}
