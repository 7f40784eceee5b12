/**
 * PageGroupAggregator: one group per identifier, in first-seen order.
 *
 * The first page carrying an identifier opens its group and is the only page
 * whose crop rectangle is ever computed (the rect factory is called lazily).
 * Later pages with the same identifier are either dropped and recorded as
 * duplicates, or appended to the group, depending on the duplicate policy.
 */

import type { Group, Identifier, Rect } from './types';

export type DuplicatePolicy = 'drop' | 'merge';

export type OfferOutcome = 'opened' | 'duplicate' | 'merged' | 'skipped';

export interface DuplicatePage<TRef> {
  key: Identifier;
  page: TRef;
  /** First page of the group the duplicate belongs to */
  firstPage: TRef;
}

export class PageGroupAggregator<TRef> {
  private readonly byKey = new Map<Identifier, Group<TRef>>();
  private readonly ordered: Group<TRef>[] = [];
  private readonly duplicatePages: DuplicatePage<TRef>[] = [];

  constructor(private readonly policy: DuplicatePolicy = 'drop') {}

  /**
   * Record one page. Pages must be offered in page order.
   * `rectFor` runs only when the page opens a new group.
   */
  offer(page: TRef, key: Identifier | null, rectFor: () => Rect): OfferOutcome {
    if (key === null) return 'skipped';

    const existing = this.byKey.get(key);
    if (existing) {
      if (this.policy === 'merge') {
        existing.pages.push(page);
        return 'merged';
      }
      this.duplicatePages.push({ key, page, firstPage: existing.pages[0] });
      return 'duplicate';
    }

    const group: Group<TRef> = { key, pages: [page], sharedRect: rectFor() };
    this.byKey.set(key, group);
    this.ordered.push(group);
    return 'opened';
  }

  has(key: Identifier): boolean {
    return this.byKey.has(key);
  }

  /** Groups in first-occurrence order */
  groups(): readonly Group<TRef>[] {
    return this.ordered;
  }

  duplicates(): readonly DuplicatePage<TRef>[] {
    return this.duplicatePages;
  }
}

/**
 * Group a page-ordered sequence of (page, identifier) pairs in one call.
 */
export function groupPages<TRef>(
  entries: Iterable<{ page: TRef; key: Identifier | null }>,
  rectFor: (page: TRef) => Rect,
  policy: DuplicatePolicy = 'drop',
): { groups: readonly Group<TRef>[]; duplicates: readonly DuplicatePage<TRef>[] } {
  const aggregator = new PageGroupAggregator<TRef>(policy);
  for (const { page, key } of entries) {
    aggregator.offer(page, key, () => rectFor(page));
  }
  return { groups: aggregator.groups(), duplicates: aggregator.duplicates() };
}
