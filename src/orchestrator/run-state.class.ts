import type { ResultEnvelope } from '../types/envelope.types.js';
import { envelopeKey } from '../types/envelope.types.js';
import type { RunCounters, TaskErrorRecord } from '../types/run.types.js';

function endpointKey(namespace: string, region: string): string {
  return `${namespace}/${region}`;
}

/**
 * (namespace, region) pairs confirmed unreachable. Only grows during a run.
 */
export class UnavailableEndpointSet {
  private readonly keys = new Set<string>();

  add(namespace: string, region: string): boolean {
    const key = endpointKey(namespace, region);
    if (this.keys.has(key)) return false;
    this.keys.add(key);
    return true;
  }

  has(namespace: string, region: string): boolean {
    return this.keys.has(endpointKey(namespace, region));
  }

  get size(): number {
    return this.keys.size;
  }

  values(): string[] {
    return [...this.keys].sort();
  }
}

/**
 * The state shared by every task of a run.
 *
 * Every mutator is synchronous: tasks interleave only at `await` points,
 * so each call runs to completion before another task resumes.
 */
export class RunState {
  readonly unavailable = new UnavailableEndpointSet();
  private readonly claimed = new Set<string>();
  private readonly counters: RunCounters = {
    executed: 0,
    successful: 0,
    failed: 0,
    unavailable: 0,
    skipped: 0,
    skippedTasks: 0,
    errors: [],
  };

  /** False when (namespace, region, operation) already ran in this run. */
  claimOperation(namespace: string, region: string, operation: string): boolean {
    const key = envelopeKey(namespace, region, operation);
    if (this.claimed.has(key)) return false;
    this.claimed.add(key);
    return true;
  }

  recordEnvelope(envelope: ResultEnvelope): void {
    this.counters.executed++;
    if (envelope.success) {
      this.counters.successful++;
    } else if (envelope.notAvailable) {
      this.counters.unavailable++;
    } else {
      this.counters.failed++;
    }
  }

  recordSkipped(count = 1): void {
    if (count > 0) this.counters.skipped += count;
  }

  recordSkippedTask(): void {
    this.counters.skippedTasks++;
  }

  recordError(error: TaskErrorRecord): void {
    this.counters.errors.push(error);
  }

  snapshot(): RunCounters {
    return { ...this.counters, errors: [...this.counters.errors] };
  }
}
