/**
 * Slug Table
 * Makes heading slugs unique within one render
 */

export class SlugTable {
  // slug -> last numeric suffix handed out for it (1 = only the bare form)
  private counts = new Map<string, number>();

  /**
   * Resolve a candidate to a slug not yet used in this table
   *
   * @example
   * const table = new SlugTable();
   * table.resolve("intro") // "intro"
   * table.resolve("intro") // "intro-2"
   * table.resolve("intro") // "intro-3"
   */
  resolve(candidate: string): string {
    const seen = this.counts.get(candidate);
    if (seen === undefined) {
      this.counts.set(candidate, 1);
      return candidate;
    }

    // Skip numbered forms that already belong to another heading
    let n = seen + 1;
    while (this.counts.has(`${candidate}-${n}`)) {
      n++;
    }

    const slug = `${candidate}-${n}`;
    this.counts.set(candidate, n);
    this.counts.set(slug, 1);
    return slug;
  }

  has(slug: string): boolean {
    return this.counts.has(slug);
  }

  get size(): number {
    return this.counts.size;
  }

  entries(): IterableIterator<[string, number]> {
    return this.counts.entries();
  }
}
