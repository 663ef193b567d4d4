/**
 * Render Rule: Plain Heading Tags
 *
 * Headings outside the slug table (levels 4-6) pass straight through
 * without an id. Levels 1-3 never reach this rule; the renderer buffers
 * them to inject the slug.
 */

import { ofKind, type RuleSet } from "../rule-set";
import type { StartHeadingEvent, EndHeadingEvent } from "../../types";

export function headingTagsRule() {
  return (rules: RuleSet): void => {
    rules.addRule<StartHeadingEvent | EndHeadingEvent>("headingTags", {
      filter: ofKind("startHeading", "endHeading"),
      replacement: (event) =>
        event.kind === "startHeading"
          ? `<h${event.level}>`
          : `</h${event.level}>\n`,
    });
  };
}
