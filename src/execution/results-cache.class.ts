import { isPagedPayload } from '../types/envelope.types.js';

function isItemArray(value: unknown): value is unknown[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string' || (typeof item === 'object' && item !== null));
}

function flattenPage(page: unknown): unknown[] {
  if (Array.isArray(page)) return page;
  if (typeof page !== 'object' || page === null) return [];

  const items: unknown[] = [];
  let sawCollection = false;
  for (const value of Object.values(page)) {
    if (isItemArray(value)) {
      sawCollection = true;
      items.push(...value);
    }
  }
  return sawCollection ? items : [page];
}

/**
 * Items of an operation result. Each page's top-level arrays contribute
 * their elements; a page without arrays is itself an item.
 */
export function flattenItems(payload: unknown): unknown[] {
  if (isPagedPayload(payload)) {
    return payload.pages.flatMap(flattenPage);
  }
  return flattenPage(payload);
}

/**
 * Task-local store of flattened `list` results, keyed by operation name.
 */
export class ResultsCache {
  private readonly entries = new Map<string, unknown[]>();

  set(operation: string, items: unknown[]): void {
    this.entries.set(operation, items);
  }

  get(operation: string): unknown[] | undefined {
    return this.entries.get(operation);
  }

  /** Entries in insertion order. */
  listEntries(): Array<[operation: string, items: unknown[]]> {
    return [...this.entries.entries()];
  }

  allItems(): unknown[] {
    return [...this.entries.values()].flat();
  }

  get size(): number {
    return this.entries.size;
  }
}
