import { ofKind, type RuleSet } from "../rule-set";

export function thematicBreakRule() {
  return (rules: RuleSet): void => {
    rules.addRule("thematicBreak", {
      filter: ofKind("rule"),
      replacement: () => "<hr>\n",
    });
  };
}
