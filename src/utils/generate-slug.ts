/**
 * Heading Slug Generator
 * Turns heading text into a URL-fragment-safe slug that keeps CJK text as-is
 */

import { classifyChar, foldChar } from "./classify-char";

export const DEFAULT_FALLBACK_SLUG = "section";

// A fallback must itself be a valid slug
export const FALLBACK_SLUG_PATTERN = /^[a-z0-9]+(-[a-z0-9]+)*$/;

export interface SlugCandidate {
  slug: string;
  // True when the text had nothing sluggable and the fallback was used
  degenerate: boolean;
}

type Piece = "cjk" | "ascii";

/**
 * A hyphen goes between two retained characters when the script changes,
 * or when separators split two ASCII words. CJK runs split by separators
 * merge, since CJK text carries no word breaks.
 */
function needsHyphen(previous: Piece, next: Piece, separated: boolean): boolean {
  return previous !== next || (separated && next === "ascii");
}

/**
 * Generate a slug candidate and report whether the fallback was needed
 */
export function generateSlugCandidate(
  text: string,
  fallback: string = DEFAULT_FALLBACK_SLUG,
): SlugCandidate {
  let slug = "";
  let previous: Piece | null = null;
  let separated = false;

  for (const raw of text) {
    for (const char of foldChar(raw)) {
      const kind = classifyChar(char);

      if (kind === "separator") {
        separated = true;
        continue;
      }
      if (kind === "other") continue;

      // Only ever one hyphen per boundary, never leading or trailing
      if (previous !== null && needsHyphen(previous, kind, separated)) {
        slug += "-";
      }
      slug += kind === "ascii" ? char.toLowerCase() : char;
      previous = kind;
      separated = false;
    }
  }

  if (slug === "") {
    return { slug: fallback, degenerate: true };
  }
  return { slug, degenerate: false };
}

/**
 * Generate a heading slug
 *
 * @example
 * generateSlug("Hello World") // "hello-world"
 * generateSlug("日本 語") // "日本語"
 * generateSlug("Hello 世界") // "hello-世界"
 * generateSlug("世界 Hello 世界") // "世界-hello-世界"
 * generateSlug("!!!") // "section"
 */
export function generateSlug(
  text: string,
  fallback: string = DEFAULT_FALLBACK_SLUG,
): string {
  return generateSlugCandidate(text, fallback).slug;
}
