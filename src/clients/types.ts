export type OperationInput = Record<string, unknown>;
export type OperationOutput = Record<string, unknown>;

export interface PaginateOptions {
  startingToken?: string;
  pageSize?: number;
}

export type Paginator = (input: OperationInput, options: PaginateOptions) => AsyncIterable<OperationOutput>;

/**
 * Client bound to one (namespace, region).
 */
export interface OperationClient {
  readonly namespace: string;
  readonly region: string;
  hasOperation(operation: string): boolean;
  call(operation: string, input: OperationInput): Promise<OperationOutput>;
  /** Null when the client ships no paginator for the operation. */
  getPaginator(operation: string): Paginator | null;
  destroy(): void;
}

export interface CallerIdentity {
  accountId?: string;
  arn?: string;
  userId?: string;
  accountAlias?: string;
}

export interface ClientProvider {
  createClient(namespace: string, region: string): Promise<OperationClient>;
  /** Throws CredentialsError when no usable credentials exist. */
  identify(): Promise<CallerIdentity>;
  listRegions?(): Promise<string[]>;
}
