import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import jsonStableStringify from 'json-stable-stringify';

import type { Logger } from '../concerns/logger.js';
import { getGlobalLogger } from '../concerns/logger.js';
import { tryFn } from '../concerns/try-fn.js';
import { StorageError } from '../errors.js';
import type { ResultStorage } from '../storage/result-storage.js';
import { isPagedPayload, type ResultEnvelope } from '../types/envelope.types.js';
import { getDefaultResourceFieldTable, type ResourceFieldTable } from './resource-fields.js';
import { DEFAULT_RESOURCE_FILTERS, PASSTHROUGH_FILTER, type ResourceFilter } from './resource-filters.js';

export const INDEX_FILE = 'index.json';

/** Error codes that mean "not there" rather than "broken". */
export const NOT_AVAILABLE_CODES: ReadonlySet<string> = new Set([
  'OperationNotFound',
  'EndpointNotAvailable',
  'RequestExpired',
]);

export interface RegionIndexEntry {
  successful: number;
  failed: number;
  unavailable: number;
  resources: number;
}

export interface InventoryIndex {
  /** namespace → region → operation → deduplicated resource count */
  counts: Record<string, Record<string, Record<string, number>>>;
  namespaces: Record<string, { regions: Record<string, RegionIndexEntry> }>;
  regions: string[];
  totalEnvelopes: number;
  totalResources: number;
}

export interface ResourceIndexerOptions {
  fields?: ResourceFieldTable;
  filters?: ReadonlyMap<string, ResourceFilter>;
  logger?: Logger;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isUnavailableEnvelope(envelope: ResultEnvelope): boolean {
  return envelope.notAvailable || (envelope.error !== undefined && NOT_AVAILABLE_CODES.has(envelope.error.code));
}

/**
 * Turns persisted envelopes into per-operation resource counts.
 *
 * Only successful, available envelopes are counted. A count is never
 * guessed: a payload with no known collection and no single-resource
 * identifier counts 0.
 */
export class ResourceIndexer {
  private readonly fields: ResourceFieldTable;
  private readonly filters: ReadonlyMap<string, ResourceFilter>;
  private readonly logger: Logger;

  constructor(options: ResourceIndexerOptions = {}) {
    this.fields = options.fields ?? getDefaultResourceFieldTable();
    this.filters = options.filters ?? DEFAULT_RESOURCE_FILTERS;
    this.logger = options.logger ?? getGlobalLogger();
  }

  async build(storage: ResultStorage): Promise<InventoryIndex> {
    const index: InventoryIndex = {
      counts: {},
      namespaces: {},
      regions: [],
      totalEnvelopes: 0,
      totalResources: 0,
    };
    const regions = new Set<string>();

    for await (const envelope of storage.list()) {
      const { namespace, region, operation } = envelope;
      regions.add(region);
      index.totalEnvelopes++;

      const namespaceEntry = (index.namespaces[namespace] ??= { regions: {} });
      const regionEntry = (namespaceEntry.regions[region] ??= { successful: 0, failed: 0, unavailable: 0, resources: 0 });

      if (envelope.success) {
        regionEntry.successful++;
      } else if (isUnavailableEnvelope(envelope)) {
        regionEntry.unavailable++;
        continue;
      } else {
        regionEntry.failed++;
        continue;
      }

      const count = this.countResources(envelope);
      const regionCounts = ((index.counts[namespace] ??= {})[region] ??= {});
      regionCounts[operation] = count;
      regionEntry.resources += count;
      index.totalResources += count;
    }

    index.regions = [...regions].sort();
    this.logger.info(
      {
        namespaces: Object.keys(index.namespaces).length,
        regions: index.regions.length,
        envelopes: index.totalEnvelopes,
        resources: index.totalResources,
      },
      'inventory indexed'
    );
    return index;
  }

  countResources(envelope: ResultEnvelope): number {
    const { payload, namespace, operation } = envelope;
    if (!envelope.success || envelope.notAvailable || payload === undefined) return 0;

    const filter = this.filters.get(namespace) ?? PASSTHROUGH_FILTER;
    const pages: unknown[] = isPagedPayload(payload) ? payload.pages : [payload];
    const seen = new Set<string>();
    let foundCollection = false;

    for (const page of pages) {
      const items = this.pageItems(page, filter, operation);
      if (items === null) continue;
      foundCollection = true;
      for (const item of items) {
        if (filter.keep(item, operation)) seen.add(this.dedupKey(item));
      }
    }

    if (foundCollection) return seen.size;

    if (!isPagedPayload(payload) && isRecord(payload) && this.fields.singleResourceFields.some((field) => field in payload)) {
      return 1;
    }
    return 0;
  }

  /** First identifier field present, else the item's stable JSON. */
  dedupKey(item: unknown): string {
    if (typeof item === 'string') return item;
    if (typeof item === 'number') return String(item);
    if (isRecord(item)) {
      for (const field of this.fields.identifierFields) {
        const value = item[field];
        if (typeof value === 'string' || typeof value === 'number') return String(value);
      }
    }
    return jsonStableStringify(item) ?? String(item);
  }

  private pageItems(page: unknown, filter: ResourceFilter, operation: string): unknown[] | null {
    if (Array.isArray(page)) return page;
    if (!isRecord(page)) return null;

    const extracted = filter.extract?.(page, operation) ?? null;
    if (extracted) return extracted;

    for (const field of this.fields.collectionFields) {
      const value = page[field];
      if (Array.isArray(value)) return value;
    }
    return null;
  }
}

/** Writes `<runDir>/index.json` and returns its path. */
export async function writeIndex(runDir: string, index: InventoryIndex): Promise<string> {
  const filePath = path.join(runDir, INDEX_FILE);
  const [ok, err] = await tryFn(async () => {
    await mkdir(runDir, { recursive: true });
    await writeFile(filePath, JSON.stringify(index, null, 2));
  });
  if (!ok) {
    throw new StorageError(`Unable to write ${filePath}`, { path: filePath, original: err });
  }
  return filePath;
}
