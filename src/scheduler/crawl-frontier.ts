/**
 * Shared URL queue for the page lanes of one job run.
 *
 * Every URL ever admitted counts toward `limit`, including the ones skipped
 * because an earlier run already crawled them. Keys are compared
 * case-insensitively.
 */
export class CrawlFrontier {
  private pending: string[] = [];
  private seen = new Set<string>();
  private inFlight = 0;
  private waiters: Array<() => void> = [];
  private closed = false;

  constructor(
    private readonly limit: number,
    private readonly skip: Set<string> = new Set()
  ) {}

  /**
   * Admits new URLs while the limit allows
   * @returns How many were queued for fetching
   */
  add(urls: string[]): number {
    let queued = 0;
    for (const url of urls) {
      const key = url.toLowerCase();
      if (this.seen.has(key) || this.seen.size >= this.limit) continue;

      this.seen.add(key);
      if (!this.skip.has(url)) {
        this.pending.push(url);
        queued++;
      }
    }
    this.wake();
    return queued;
  }

  /**
   * Next URL to fetch. Waits while other lanes may still discover links;
   * null once the queue is drained and nothing is in flight, or after close().
   * Every non-null result must be followed by complete().
   */
  async next(): Promise<string | null> {
    for (;;) {
      if (this.closed) return null;

      const url = this.pending.shift();
      if (url !== undefined) {
        this.inFlight++;
        return url;
      }
      if (this.inFlight === 0) return null;

      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }
  }

  complete(discoveredUrls: string[] = []): void {
    this.inFlight--;
    this.add(discoveredUrls);
  }

  close(): void {
    this.closed = true;
    this.wake();
  }

  get admitted(): number {
    return this.seen.size;
  }

  private wake(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const resolve of waiters) resolve();
  }
}
