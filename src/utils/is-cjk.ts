/**
 * CJK Code Point Table
 * Han, Hiragana, Katakana and Hangul ranges pinned to one Unicode version.
 * Loaded from a bundled table so results never depend on the host's ICU data.
 */

import { z } from "zod";
import table from "../data/cjk-ranges.json";

export type CjkScript = "Han" | "Hiragana" | "Katakana" | "Hangul";

const HexCodePoint = z
  .string()
  .regex(/^[0-9A-F]{4,6}$/)
  .transform((hex) => parseInt(hex, 16));

const CjkTableSchema = z.object({
  unicodeVersion: z.string(),
  scripts: z.object({
    Han: z.array(z.tuple([HexCodePoint, HexCodePoint])),
    Hiragana: z.array(z.tuple([HexCodePoint, HexCodePoint])),
    Katakana: z.array(z.tuple([HexCodePoint, HexCodePoint])),
    Hangul: z.array(z.tuple([HexCodePoint, HexCodePoint])),
  }),
});

interface CjkRange {
  start: number;
  end: number;
  script: CjkScript;
}

const parsed = CjkTableSchema.parse(table);

export const CJK_UNICODE_VERSION = parsed.unicodeVersion;

const SCRIPTS: readonly CjkScript[] = ["Han", "Hiragana", "Katakana", "Hangul"];

const RANGES: readonly CjkRange[] = SCRIPTS.flatMap((script) =>
  parsed.scripts[script].map(([start, end]) => ({ start, end, script })),
).sort((a, b) => a.start - b.start);

/**
 * Find the CJK script of a code point, or null when it is not CJK
 *
 * @example
 * cjkScriptOf(0x4e2d) // "Han" (中)
 * cjkScriptOf(0x3042) // "Hiragana" (あ)
 * cjkScriptOf(0x61) // null (a)
 */
export function cjkScriptOf(codePoint: number): CjkScript | null {
  let low = 0;
  let high = RANGES.length - 1;

  while (low <= high) {
    const mid = (low + high) >>> 1;
    const range = RANGES[mid];
    if (codePoint < range.start) {
      high = mid - 1;
    } else if (codePoint > range.end) {
      low = mid + 1;
    } else {
      return range.script;
    }
  }

  return null;
}

export function isCjk(codePoint: number): boolean {
  return cjkScriptOf(codePoint) !== null;
}
