// CHANGE: Shared per-run registry of claimed URLs and name occurrences.
// WHY: Concurrent plugin tasks must agree on which descriptor is first and which suffix is next.

/**
 * Shared bookkeeping for one processing run: which source URLs were claimed and how
 * often each resolved name occurred.
 *
 * Both update sequences run without an `await` between read and write, so concurrent
 * plugin tasks on the event loop cannot interleave inside them.
 */
export class RunRegistry {
  private readonly seenUrls = new Set<string>();
  private readonly nameCounts = new Map<string, number>();

  /**
   * Claim a source URL.
   *
   * @returns true for the first claim of `url`, false for every later one.
   */
  claimUrl(url: string): boolean {
    if (this.seenUrls.has(url)) {
      return false;
    }
    this.seenUrls.add(url);
    return true;
  }

  /**
   * Reserve a unique display name. The first occurrence keeps `name` and seeds the counter
   * at 0; the Nth later occurrence receives `name_N`.
   */
  reserveName(name: string): string {
    const count = this.nameCounts.get(name);
    if (count === undefined) {
      this.nameCounts.set(name, 0);
      return name;
    }
    const next = count + 1;
    this.nameCounts.set(name, next);
    return `${name}_${next}`;
  }

  stats(): { readonly urls: number; readonly names: number } {
    return { urls: this.seenUrls.size, names: this.nameCounts.size };
  }
}
