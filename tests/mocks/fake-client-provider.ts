import { ClientUnavailableError, OperationNotFoundError } from '../../src/errors.js';
import type {
  CallerIdentity,
  ClientProvider,
  OperationClient,
  OperationInput,
  OperationOutput,
  Paginator,
} from '../../src/clients/types.js';

export type OperationHandler = (input: OperationInput) => OperationOutput | Promise<OperationOutput>;

/** What one (namespace, region) answers. */
export interface FakeEndpoint {
  operations: Record<string, OperationHandler | OperationOutput>;
  /** Pages a paginator yields after the first page. */
  paginators?: Record<string, OperationOutput[] | (() => AsyncIterable<OperationOutput>)>;
}

export interface RecordedCall {
  namespace: string;
  region: string;
  operation: string;
  input: OperationInput;
}

/**
 * Error shaped like an SDK service exception.
 */
export function awsError(name: string, message: string = name, httpStatusCode?: number): Error {
  const error = new Error(message);
  error.name = name;
  return Object.assign(error, { $metadata: { httpStatusCode } });
}

export class FakeOperationClient implements OperationClient {
  readonly namespace: string;
  readonly region: string;
  destroyed = false;
  private readonly endpoint: FakeEndpoint;
  private readonly log: RecordedCall[];

  constructor(namespace: string, region: string, endpoint: FakeEndpoint, log: RecordedCall[]) {
    this.namespace = namespace;
    this.region = region;
    this.endpoint = endpoint;
    this.log = log;
  }

  hasOperation(operation: string): boolean {
    return operation in this.endpoint.operations;
  }

  async call(operation: string, input: OperationInput): Promise<OperationOutput> {
    this.log.push({ namespace: this.namespace, region: this.region, operation, input });
    const entry = this.endpoint.operations[operation];
    if (entry === undefined) {
      throw new OperationNotFoundError({ namespace: this.namespace, operation });
    }
    return typeof entry === 'function' ? entry(input) : entry;
  }

  getPaginator(operation: string): Paginator | null {
    const source = this.endpoint.paginators?.[operation];
    if (!source) return null;

    const { namespace, region, log } = this;
    return async function* (input, options) {
      log.push({
        namespace,
        region,
        operation: `paginate:${operation}`,
        input: { ...input, startingToken: options.startingToken },
      });
      const pages = typeof source === 'function' ? source() : source;
      for await (const page of pages) {
        yield page;
      }
    };
  }

  destroy(): void {
    this.destroyed = true;
  }
}

export interface FakeClientProviderOptions {
  /** Keyed by `namespace/region`, falling back to `namespace`. */
  endpoints: Record<string, FakeEndpoint>;
  identity?: CallerIdentity;
  identityError?: Error;
  regions?: string[];
}

/**
 * In-process stand-in for the AWS client provider.
 */
export class FakeClientProvider implements ClientProvider {
  readonly calls: RecordedCall[] = [];
  readonly clients: FakeOperationClient[] = [];
  private readonly options: FakeClientProviderOptions;

  constructor(options: FakeClientProviderOptions) {
    this.options = options;
  }

  async createClient(namespace: string, region: string): Promise<OperationClient> {
    const endpoint = this.options.endpoints[`${namespace}/${region}`] ?? this.options.endpoints[namespace];
    if (!endpoint) {
      throw new ClientUnavailableError({ namespace });
    }
    const client = new FakeOperationClient(namespace, region, endpoint, this.calls);
    this.clients.push(client);
    return client;
  }

  async identify(): Promise<CallerIdentity> {
    if (this.options.identityError) throw this.options.identityError;
    return this.options.identity ?? { accountId: '123456789012' };
  }

  async listRegions(): Promise<string[]> {
    return this.options.regions ?? ['us-east-1'];
  }

  /** Operations called for one (namespace, region), in call order. */
  operationsCalled(namespace: string, region: string): string[] {
    return this.calls
      .filter((call) => call.namespace === namespace && call.region === region)
      .map((call) => call.operation);
  }
}
