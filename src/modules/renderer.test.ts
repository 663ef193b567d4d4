import { describe, it, expect } from "vitest";
import { renderEvents } from "./renderer";
import { createRuleSet, RuleSet } from "../html";
import { InputError, InvariantViolationError } from "../utils/render-error";
import type { MarkdownEvent } from "../types";

const heading = (level: 1 | 2 | 3 | 4 | 5 | 6, ...inner: MarkdownEvent[]): MarkdownEvent[] => [
  { kind: "startHeading", level },
  ...inner,
  { kind: "endHeading", level },
];

const text = (value: string): MarkdownEvent => ({ kind: "text", text: value });

function run(events: MarkdownEvent[], diagnostics = false) {
  return renderEvents(events, { rules: createRuleSet(), diagnostics });
}

function violation(events: MarkdownEvent[]): InvariantViolationError {
  try {
    run(events);
  } catch (error) {
    if (error instanceof InvariantViolationError) return error;
    throw error;
  }
  throw new Error("expected an invariant violation");
}

describe("renderEvents", () => {
  it("injects slugs into level 1-3 headings", () => {
    const result = run([
      ...heading(1, text("Intro")),
      { kind: "startBlock", tag: "p" },
      text("Body"),
      { kind: "endBlock", tag: "p" },
      ...heading(2, text("Intro")),
    ]);

    expect(result.html).toBe(
      '<h1 id="intro">Intro</h1>\n<p>Body</p>\n<h2 id="intro-2">Intro</h2>\n',
    );
    expect(result.headings).toEqual([
      { level: 1, text: "Intro", slug: "intro" },
      { level: 2, text: "Intro", slug: "intro-2" },
    ]);
  });

  it("passes level 4-6 headings through without an id", () => {
    const result = run(heading(4, text("Deep")));
    expect(result.html).toBe("<h4>Deep</h4>\n");
    expect(result.headings).toEqual([]);
  });

  it("collects raw text from code spans and emphasis", () => {
    const result = run(
      heading(
        2,
        text("Use "),
        { kind: "code", text: "a<b" },
        text(" "),
        { kind: "startInline", tag: "em" },
        text("now"),
        { kind: "endInline", tag: "em" },
      ),
    );

    expect(result.html).toBe(
      '<h2 id="use-a-b-now">Use <code>a&lt;b</code> <em>now</em></h2>\n',
    );
    expect(result.headings[0]).toEqual({ level: 2, text: "Use a<b now", slug: "use-a-b-now" });
  });

  it("turns breaks into spaces in the heading text", () => {
    const result = run(heading(1, text("Foo"), { kind: "softBreak" }, text("Bar")));
    expect(result.headings[0].text).toBe("Foo Bar");
    expect(result.headings[0].slug).toBe("foo-bar");
    expect(result.html).toBe('<h1 id="foo-bar">Foo\nBar</h1>\n');
  });

  it("freezes heading records", () => {
    const [record] = run(heading(3, text("X"))).headings;
    expect(Object.isFrozen(record)).toBe(true);
  });

  it("uses the fallback slug for empty headings", () => {
    const result = renderEvents([...heading(1), ...heading(1, text("!!!"))], {
      rules: createRuleSet(),
      fallbackSlug: "part",
    });
    expect(result.headings.map((h) => h.slug)).toEqual(["part", "part-2"]);
  });

  it("rejects a fallback that is not a valid slug", () => {
    for (const fallbackSlug of ["", "Part", "a--b", "-a"]) {
      expect(() =>
        renderEvents(heading(1), { rules: createRuleSet(), fallbackSlug }),
      ).toThrow(InputError);
    }
  });

  it("records degenerate slugs only with diagnostics on", () => {
    expect(run(heading(1, text("?")), false).notes).toEqual([]);
    expect(run(heading(1, text("?")), true).notes).toEqual([
      { type: "degenerate-slug", level: 1, text: "?", slug: "section" },
    ]);
  });

  it("rejects a close without an open heading", () => {
    const error = violation([{ kind: "endHeading", level: 2 }]);
    expect(error.reason).toBe("unmatched-heading-close");
    expect(error.message).toBe("Closing h2 without an open heading");
  });

  it("rejects a close of another level", () => {
    const error = violation([{ kind: "startHeading", level: 1 }, { kind: "endHeading", level: 2 }]);
    expect(error.reason).toBe("unmatched-heading-close");
    expect(error.message).toBe("Closing h2 while h1 is open");
  });

  it("rejects nested headings", () => {
    const error = violation([
      { kind: "startHeading", level: 1 },
      { kind: "startHeading", level: 5 },
    ]);
    expect(error.reason).toBe("nested-heading");
    expect(error.message).toBe("Opening h5 inside an open h1");
  });

  it("rejects block events inside a heading", () => {
    const error = violation([{ kind: "startHeading", level: 3 }, { kind: "rule" }]);
    expect(error.reason).toBe("unexpected-event");
    expect(error.message).toBe('Block event "rule" inside an open h3');
  });

  it("rejects a stream ending inside a heading", () => {
    const error = violation([{ kind: "startHeading", level: 2 }, text("x")]);
    expect(error.reason).toBe("unterminated-heading");
    expect(error.message).toBe("Event stream ended inside an open h2");
  });

  it("lets a stray level 5 close through to the rules", () => {
    expect(run([{ kind: "endHeading", level: 5 }]).html).toBe("</h5>\n");
  });

  it("fails when no rule accepts an event", () => {
    expect(() => renderEvents([text("x")], { rules: new RuleSet() })).toThrow(
      'No render rule accepts "text" events',
    );
  });

  it("reads the event stream once", () => {
    const events = heading(1, text("A"));
    let iterations = 0;
    let reads = 0;
    const counted: Iterable<MarkdownEvent> = {
      *[Symbol.iterator]() {
        iterations += 1;
        for (const event of events) {
          reads += 1;
          yield event;
        }
      },
    };

    renderEvents(counted, { rules: createRuleSet() });
    expect(iterations).toBe(1);
    expect(reads).toBe(events.length);
  });
});
