import type { OperationOutput } from '../clients/types.js';
import type { CallErrorKind } from '../concerns/error-classifier.js';

/** Several outputs of one operation: continuation pages or follow-up calls. */
export interface PagedPayload {
  pageCount: number;
  pages: unknown[];
}

export type EnvelopePayload = OperationOutput | PagedPayload | unknown[];

export interface EnvelopeError {
  code: string;
  message: string;
  kind?: CallErrorKind;
}

/**
 * Outcome of one executed operation for one (namespace, region).
 */
export interface ResultEnvelope {
  namespace: string;
  region: string;
  operation: string;
  /** ISO-8601 time the envelope was produced. */
  timestamp: string;
  success: boolean;
  paginated: boolean;
  notAvailable: boolean;
  error?: EnvelopeError;
  payload?: EnvelopePayload;
  /** Parameter name to the values the follow-up calls used. */
  inferredParams?: Record<string, string[]>;
  note?: string;
}

export function isPagedPayload(value: unknown): value is PagedPayload {
  return (
    typeof value === 'object' &&
    value !== null &&
    'pageCount' in value &&
    'pages' in value &&
    typeof value.pageCount === 'number' &&
    Array.isArray(value.pages)
  );
}

export function envelopeKey(namespace: string, region: string, operation: string): string {
  return `${namespace}/${region}/${operation}`;
}
