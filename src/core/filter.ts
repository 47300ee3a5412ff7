type FilterFragment = string | null | undefined | false;

/**
 * Collects `$filter` predicates and joins them with `and`. Fragments are
 * taken verbatim; quoting string literals is up to whoever builds them.
 */
export class FilterBuilder {
  private readonly fragments: string[] = [];

  add(fragment: FilterFragment): this {
    if (typeof fragment === "string" && fragment.trim()) {
      this.fragments.push(fragment.trim());
    }
    return this;
  }

  get size(): number {
    return this.fragments.length;
  }

  build(): string | undefined {
    return this.fragments.length > 0 ? this.fragments.join(" and ") : undefined;
  }
}

/** ISO-8601 UTC timestamp `days` before `now`, for `ge` lower bounds. */
export function daysAgoIso(days: number, now: number = Date.now()): string {
  return new Date(now - days * 86_400_000).toISOString();
}
