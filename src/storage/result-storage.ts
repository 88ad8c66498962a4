import type { EnvelopeError, EnvelopePayload, ResultEnvelope } from '../types/envelope.types.js';
import type { RunMetadata, RunSummary } from '../types/run.types.js';
import { StorageError } from '../errors.js';

/**
 * Persists envelopes addressable by (namespace, region, operation) and
 * enumerates them back for indexing.
 */
export interface ResultStorage {
  put(envelope: ResultEnvelope): Promise<void>;
  list(): AsyncIterable<ResultEnvelope>;
  writeSummary(summary: RunSummary): Promise<void>;
  writeMetadata(metadata: RunMetadata): Promise<void>;
}

/** On-disk layout of one envelope. */
export interface StoredEnvelope {
  metadata: {
    namespace: string;
    region: string;
    operation: string;
    timestamp: string;
    paginated: boolean;
    success: boolean;
    notAvailable: boolean;
    inferredParams?: Record<string, string[]>;
    note?: string;
  };
  data: EnvelopePayload | null;
  error: EnvelopeError | null;
}

export function toStoredEnvelope(envelope: ResultEnvelope): StoredEnvelope {
  return {
    metadata: {
      namespace: envelope.namespace,
      region: envelope.region,
      operation: envelope.operation,
      timestamp: envelope.timestamp,
      paginated: envelope.paginated,
      success: envelope.success,
      notAvailable: envelope.notAvailable,
      ...(envelope.inferredParams ? { inferredParams: envelope.inferredParams } : {}),
      ...(envelope.note ? { note: envelope.note } : {}),
    },
    data: envelope.payload ?? null,
    error: envelope.error ?? null,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
}

function readInferredParams(value: unknown): Record<string, string[]> | undefined {
  if (!isRecord(value)) return undefined;
  const out: Record<string, string[]> = {};
  for (const [name, values] of Object.entries(value)) {
    if (Array.isArray(values)) out[name] = values.filter((entry): entry is string => typeof entry === 'string');
  }
  return out;
}

function readPayload(value: unknown): EnvelopePayload | undefined {
  if (Array.isArray(value)) return value;
  if (isRecord(value)) return value;
  return undefined;
}

/**
 * Parses a stored document back into an envelope. Throws StorageError when
 * the identifying metadata is missing.
 */
export function fromStoredEnvelope(document: unknown, source: string): ResultEnvelope {
  const metadata = isRecord(document) ? document.metadata : undefined;
  if (!isRecord(document) || !isRecord(metadata)) {
    throw new StorageError(`Stored envelope ${source} has no metadata`, { path: source });
  }

  const namespace = readString(metadata, 'namespace');
  const region = readString(metadata, 'region');
  const operation = readString(metadata, 'operation');
  if (!namespace || !region || !operation) {
    throw new StorageError(`Stored envelope ${source} is missing its namespace, region or operation`, { path: source });
  }

  const envelope: ResultEnvelope = {
    namespace,
    region,
    operation,
    timestamp: readString(metadata, 'timestamp') ?? '',
    success: metadata.success === true,
    paginated: metadata.paginated === true,
    notAvailable: metadata.notAvailable === true,
  };

  const payload = readPayload(document.data);
  if (payload !== undefined) envelope.payload = payload;

  if (isRecord(document.error)) {
    envelope.error = {
      code: readString(document.error, 'code') ?? 'Unknown',
      message: readString(document.error, 'message') ?? '',
    };
  }

  const inferredParams = readInferredParams(metadata.inferredParams);
  if (inferredParams) envelope.inferredParams = inferredParams;

  const note = readString(metadata, 'note');
  if (note) envelope.note = note;

  return envelope;
}
