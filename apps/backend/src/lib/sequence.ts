export interface Page<T, C> {
  items: T[];
  next?: C;
}

export type PageFetcher<T, C> = (cursor: C | undefined, limit: number) => Promise<Page<T, C>>;

/**
 * Lazily pages through a result set. Every iteration starts again from the
 * first page, so the sequence can be consumed more than once.
 */
export class PagedSequence<T, C> implements AsyncIterable<T> {
  constructor(
    private readonly fetchPage: PageFetcher<T, C>,
    readonly pageSize = 100
  ) {
    if (!Number.isInteger(pageSize) || pageSize < 1) {
      throw new RangeError(`pageSize must be a positive integer, got ${pageSize}`);
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    let cursor: C | undefined;
    for (;;) {
      const page = await this.fetchPage(cursor, this.pageSize);
      yield* page.items;
      if (page.items.length < this.pageSize || page.next === undefined) {
        return;
      }
      cursor = page.next;
    }
  }

  async toArray(): Promise<T[]> {
    const items: T[] = [];
    for await (const item of this) {
      items.push(item);
    }
    return items;
  }
}
