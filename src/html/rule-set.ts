/**
 * Render Rule Set
 * Ordered, named event-to-HTML rules. New constructs are supported by adding
 * rules; the heading and slug machinery in the renderer never changes.
 */

import type { MarkdownEvent, MarkdownEventKind } from "../types";
import { InvariantViolationError } from "../utils/render-error";

export interface RenderRule<E extends MarkdownEvent> {
  filter: (event: MarkdownEvent) => event is E;
  replacement: (event: E) => string;
}

export type RulePlugin = (rules: RuleSet) => void;

interface NamedRule {
  name: string;
  // Rendered HTML, or null when the rule does not accept the event
  apply: (event: MarkdownEvent) => string | null;
}

/**
 * Build a filter accepting events of the given kinds
 *
 * @example
 * const isBreak = ofKind("softBreak", "hardBreak");
 */
export function ofKind<K extends MarkdownEventKind>(...kinds: K[]) {
  return (event: MarkdownEvent): event is Extract<MarkdownEvent, { kind: K }> =>
    kinds.some((kind) => kind === event.kind);
}

export class RuleSet {
  private rules: NamedRule[] = [];

  /**
   * Add a rule ahead of every rule already in the set.
   * A rule with the same name is replaced.
   */
  addRule<E extends MarkdownEvent>(name: string, rule: RenderRule<E>): this {
    this.remove(name);
    this.rules.unshift({
      name,
      apply: (event) => (rule.filter(event) ? rule.replacement(event) : null),
    });
    return this;
  }

  remove(name: string): this {
    this.rules = this.rules.filter((rule) => rule.name !== name);
    return this;
  }

  has(name: string): boolean {
    return this.rules.some((rule) => rule.name === name);
  }

  get names(): string[] {
    return this.rules.map((rule) => rule.name);
  }

  use(plugins: RulePlugin | RulePlugin[]): this {
    for (const plugin of Array.isArray(plugins) ? plugins : [plugins]) {
      plugin(this);
    }
    return this;
  }

  /**
   * Render one event with the first rule that accepts it
   */
  render(event: MarkdownEvent): string {
    for (const rule of this.rules) {
      const html = rule.apply(event);
      if (html !== null) return html;
    }
    throw new InvariantViolationError(
      "unexpected-event",
      `No render rule accepts "${event.kind}" events`,
    );
  }
}
