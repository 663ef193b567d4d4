/**
 * HTML Rule Set Configuration
 * Sets up the rule set with the built-in rules, then the caller's plugins
 */

import { RuleSet, type RulePlugin } from "./rule-set";
import {
  paragraphRule,
  blockquoteRule,
  thematicBreakRule,
  headingTagsRule,
  emphasisRule,
  codeSpanRule,
  textRule,
  lineBreaksRule,
} from "./rules";

export { RuleSet, ofKind } from "./rule-set";
export type { RenderRule, RulePlugin } from "./rule-set";

export function createRuleSet(plugins: RulePlugin[] = []): RuleSet {
  const rules = new RuleSet();

  rules.use(paragraphRule());
  rules.use(blockquoteRule());
  rules.use(thematicBreakRule());
  rules.use(headingTagsRule());
  rules.use(emphasisRule());
  rules.use(codeSpanRule());
  rules.use(textRule());
  rules.use(lineBreaksRule());

  // Caller plugins go last so they take precedence over built-ins
  rules.use(plugins);

  return rules;
}
