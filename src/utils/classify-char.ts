/**
 * Character Classification
 * Sorts code points into the classes the slug generator works with
 */

import { isCjk } from "./is-cjk";

export type CharClass = "cjk" | "ascii" | "separator" | "other";

const ASCII_ALPHANUMERIC = /^[A-Za-z0-9]$/;
const SEPARATOR = /^[\s\p{P}\p{S}]$/u;
const COMBINING_MARKS = /\p{M}/gu;

/**
 * Classify a single code point
 *
 * @example
 * classifyChar("a") // "ascii"
 * classifyChar("漢") // "cjk"
 * classifyChar("。") // "separator"
 * classifyChar("ß") // "other"
 */
export function classifyChar(char: string): CharClass {
  const codePoint = char.codePointAt(0);
  if (codePoint === undefined) return "other";

  if (ASCII_ALPHANUMERIC.test(char)) return "ascii";
  if (codePoint >= 0x80 && isCjk(codePoint)) return "cjk";
  if (SEPARATOR.test(char)) return "separator";
  return "other";
}

/**
 * Fold a non-ASCII, non-CJK code point to its compatibility decomposition
 * without combining marks. ASCII and CJK code points come back unchanged;
 * CJK is never decomposed so Hangul syllables stay whole.
 *
 * @example
 * foldChar("é") // "e"
 * foldChar("Ａ") // "A"
 * foldChar("ﬁ") // "fi"
 * foldChar("한") // "한"
 */
export function foldChar(char: string): string {
  const codePoint = char.codePointAt(0);
  if (codePoint === undefined || codePoint < 0x80 || isCjk(codePoint)) {
    return char;
  }
  return char.normalize("NFKD").replace(COMBINING_MARKS, "");
}
