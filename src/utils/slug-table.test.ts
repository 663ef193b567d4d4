import { describe, it, expect } from "vitest";
import { SlugTable } from "./slug-table";

describe("SlugTable", () => {
  it("returns the first occurrence unchanged", () => {
    const table = new SlugTable();
    expect(table.resolve("intro")).toBe("intro");
  });

  it("numbers repeats from 2", () => {
    const table = new SlugTable();
    expect(table.resolve("a")).toBe("a");
    expect(table.resolve("a")).toBe("a-2");
    expect(table.resolve("a")).toBe("a-3");
  });

  it("skips numbered forms already taken by another heading", () => {
    const table = new SlugTable();
    expect(table.resolve("a")).toBe("a");
    expect(table.resolve("a-2")).toBe("a-2");
    expect(table.resolve("a")).toBe("a-3");
    expect(table.resolve("a")).toBe("a-4");
  });

  it("disambiguates a candidate that equals an earlier numbered slug", () => {
    const table = new SlugTable();
    table.resolve("a");
    table.resolve("a"); // a-2
    expect(table.resolve("a-2")).toBe("a-2-2");
  });

  it("keeps slugs unique across many repeats", () => {
    const table = new SlugTable();
    const slugs = ["x", "x", "x-2", "x", "x-3", "x-2"].map((c) => table.resolve(c));
    expect(new Set(slugs).size).toBe(slugs.length);
    expect(slugs).toEqual(["x", "x-2", "x-2-2", "x-3", "x-3-2", "x-2-3"]);
  });

  it("works with CJK slugs", () => {
    const table = new SlugTable();
    expect(table.resolve("日本語")).toBe("日本語");
    expect(table.resolve("日本語")).toBe("日本語-2");
  });

  it("exposes what it holds", () => {
    const table = new SlugTable();
    table.resolve("a");
    table.resolve("a");
    expect(table.has("a")).toBe(true);
    expect(table.has("a-2")).toBe(true);
    expect(table.has("b")).toBe(false);
    expect(table.size).toBe(2);
    expect([...table.entries()]).toEqual([
      ["a", 2],
      ["a-2", 1],
    ]);
  });

  it("shares nothing between instances", () => {
    const first = new SlugTable();
    first.resolve("a");
    const second = new SlugTable();
    expect(second.resolve("a")).toBe("a");
  });
});
