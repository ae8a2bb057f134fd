/**
 * Dedup frontier
 *
 * Every URL scheduled during a crawl session, plus the URLs the caller had
 * already seen. Append-only: nothing is ever removed.
 */

export class DedupFrontier {
  private readonly seen = new Set<string>();
  private readonly accepted: string[] = [];

  constructor(excluded: Iterable<string> = []) {
    for (const url of excluded) {
      this.seen.add(url);
    }
  }

  has(url: string): boolean {
    return this.seen.has(url);
  }

  /**
   * Schedule a URL. Returns false if it was already known.
   */
  add(url: string): boolean {
    if (this.seen.has(url)) {
      return false;
    }
    this.seen.add(url);
    this.accepted.push(url);
    return true;
  }

  /** URLs scheduled in this session, in discovery order */
  get urls(): readonly string[] {
    return this.accepted;
  }

  get size(): number {
    return this.accepted.length;
  }
}
