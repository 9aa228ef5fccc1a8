/**
 * Pages known but not yet fully processed, in discovery order.
 *
 * Insertion is idempotent and refuses URLs the caller reports as already
 * processed, so a page can never be pending and processed at once.
 */
export class Frontier {
  private readonly pending: Set<string>;
  private readonly isProcessed: (url: string) => boolean;

  constructor(
    isProcessed: (url: string) => boolean,
    initial: Iterable<string> = [],
  ) {
    this.pending = new Set();
    this.isProcessed = isProcessed;
    this.addBatch(initial);
  }

  add(url: string): boolean {
    if (this.pending.has(url) || this.isProcessed(url)) {
      return false;
    }

    this.pending.add(url);
    return true;
  }

  addBatch(urls: Iterable<string>): number {
    let added = 0;

    for (const url of urls) {
      if (this.add(url)) {
        added += 1;
      }
    }

    return added;
  }

  has(url: string): boolean {
    return this.pending.has(url);
  }

  remove(url: string): boolean {
    return this.pending.delete(url);
  }

  size(): number {
    return this.pending.size;
  }

  isEmpty(): boolean {
    return this.pending.size === 0;
  }

  values(): string[] {
    return [...this.pending];
  }
}
