import type { RawContentItem } from '../normalizer/rawContent';
import type { ContentSource, LookbackWindow } from '../types';

/**
 * Retrieves raw content from one platform. Credentials, paging and rate
 * limits are the collector's business; the pipeline only sees items.
 */
export interface ContentCollector {
  readonly source: ContentSource;
  collect(window: LookbackWindow, signal?: AbortSignal): Promise<RawContentItem[]>;
}

/**
 * Collector over a fixed list of items, e.g. content loaded from files
 */
export class StaticContentCollector implements ContentCollector {
  readonly source: ContentSource;
  private items: readonly RawContentItem[];

  constructor(source: ContentSource, items: readonly RawContentItem[]) {
    this.source = source;
    this.items = items;
  }

  async collect(): Promise<RawContentItem[]> {
    return this.items.filter((item) => item.source === this.source);
  }
}
