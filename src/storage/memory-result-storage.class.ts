import type { ResultEnvelope } from '../types/envelope.types.js';
import { envelopeKey } from '../types/envelope.types.js';
import type { RunMetadata, RunSummary } from '../types/run.types.js';
import { fromStoredEnvelope, toStoredEnvelope, type ResultStorage } from './result-storage.js';

/**
 * In-process storage for tests and dry runs. Envelopes go through the same
 * stored layout as the filesystem backend.
 */
export class MemoryResultStorage implements ResultStorage {
  private readonly objects = new Map<string, unknown>();
  summary: RunSummary | null = null;
  metadata: RunMetadata | null = null;
  putCount = 0;

  async put(envelope: ResultEnvelope): Promise<void> {
    const key = envelopeKey(envelope.namespace, envelope.region, envelope.operation);
    const serialised: unknown = JSON.parse(JSON.stringify(toStoredEnvelope(envelope)));
    this.objects.set(key, serialised);
    this.putCount++;
  }

  async *list(): AsyncIterable<ResultEnvelope> {
    const keys = [...this.objects.keys()].sort();
    for (const key of keys) {
      if (this.objects.has(key)) yield fromStoredEnvelope(this.objects.get(key), key);
    }
  }

  get(namespace: string, region: string, operation: string): ResultEnvelope | undefined {
    const key = envelopeKey(namespace, region, operation);
    return this.objects.has(key) ? fromStoredEnvelope(this.objects.get(key), key) : undefined;
  }

  keys(): string[] {
    return [...this.objects.keys()].sort();
  }

  get size(): number {
    return this.objects.size;
  }

  async writeSummary(summary: RunSummary): Promise<void> {
    this.summary = summary;
  }

  async writeMetadata(metadata: RunMetadata): Promise<void> {
    this.metadata = metadata;
  }
}
