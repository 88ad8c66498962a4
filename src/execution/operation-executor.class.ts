import type { OperationDescriptor } from '../catalog/operation-catalog-builder.class.js';
import { isContinuationMember } from '../catalog/classification.js';
import type { ClientProvider, OperationClient, OperationInput, OperationOutput } from '../clients/types.js';
import type { InventoryConfig } from '../config/inventory-config.js';
import { CallErrorClassifier, type CallErrorClassification } from '../concerns/error-classifier.js';
import type { Logger } from '../concerns/logger.js';
import { getGlobalLogger } from '../concerns/logger.js';
import { tryFn } from '../concerns/try-fn.js';
import type { EnvelopePayload, PagedPayload, ResultEnvelope } from '../types/envelope.types.js';
import { inferCandidates, DEFAULT_POST_PROCESSORS, type CandidatePostProcessor } from './parameter-inference.js';
import { ResultsCache, flattenItems } from './results-cache.class.js';
import { callWithRetry } from './retry.js';

export type ExecutorSettings = Pick<
  InventoryConfig,
  | 'maxPages'
  | 'maxFollowups'
  | 'maxRetries'
  | 'retryBaseDelayMs'
  | 'operationTimeoutMs'
  | 'attemptMultiParamOperations'
>;

export interface OperationExecutorOptions {
  clientProvider: ClientProvider;
  settings: ExecutorSettings;
  /** Operations capped at a single page. */
  singlePageOperations?: ReadonlySet<string>;
  postProcessors?: ReadonlyMap<string, CandidatePostProcessor>;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

/**
 * Calls one operation at a time for a single task. Holds the task's
 * ResultsCache and client cache; create one executor per task.
 */
export class OperationExecutor {
  readonly cache = new ResultsCache();
  private readonly clientProvider: ClientProvider;
  private readonly settings: ExecutorSettings;
  private readonly singlePageOperations: ReadonlySet<string>;
  private readonly postProcessors: ReadonlyMap<string, CandidatePostProcessor>;
  private readonly logger: Logger;
  private readonly sleep?: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private readonly clients = new Map<string, Promise<OperationClient>>();

  constructor(options: OperationExecutorOptions) {
    this.clientProvider = options.clientProvider;
    this.settings = options.settings;
    this.singlePageOperations = options.singlePageOperations ?? new Set();
    this.postProcessors = options.postProcessors ?? DEFAULT_POST_PROCESSORS;
    this.logger = options.logger ?? getGlobalLogger();
    this.sleep = options.sleep;
    this.now = options.now ?? Date.now;
  }

  async execute(
    namespace: string,
    region: string,
    operation: string,
    descriptor: OperationDescriptor
  ): Promise<ResultEnvelope | null> {
    const [clientOk, clientErr, client] = await tryFn(() => this.getClient(namespace, region));
    if (!clientOk) {
      return this.failure(namespace, region, operation, descriptor, clientErr);
    }

    if (!client.hasOperation(operation)) {
      this.logger.debug({ namespace, region, operation }, 'operation not exposed by client, skipped');
      return null;
    }

    const required = descriptor.requiredParams;
    if (required.length === 0) {
      return this.executeDirect(client, operation, descriptor);
    }
    if (required.length === 1 && required[0]) {
      return this.executeWithInference(client, operation, descriptor, required[0].name);
    }
    return this.executeWithoutRequired(client, operation, descriptor);
  }

  /** Destroys every client this executor created. */
  async destroy(): Promise<void> {
    const pending = [...this.clients.values()];
    this.clients.clear();
    for (const entry of pending) {
      const [ok, , client] = await tryFn(entry);
      if (ok) client.destroy();
    }
  }

  private getClient(namespace: string, region: string): Promise<OperationClient> {
    const key = `${namespace}:${region}`;
    let pending = this.clients.get(key);
    if (!pending) {
      pending = this.clientProvider.createClient(namespace, region);
      this.clients.set(key, pending);
    }
    return pending;
  }

  private async executeDirect(
    client: OperationClient,
    operation: string,
    descriptor: OperationDescriptor
  ): Promise<ResultEnvelope> {
    const [ok, err, payload] = await tryFn(() => this.callAndPaginate(client, operation, descriptor, {}));
    if (!ok) {
      return this.failure(client.namespace, client.region, operation, descriptor, err);
    }
    this.remember(operation, descriptor, payload);
    return this.success(client, operation, descriptor.paginated, payload);
  }

  private async executeWithInference(
    client: OperationClient,
    operation: string,
    descriptor: OperationDescriptor,
    paramName: string
  ): Promise<ResultEnvelope | null> {
    const { namespace, region } = client;
    const candidates = inferCandidates(
      this.cache.allItems(),
      paramName,
      namespace,
      this.settings.maxFollowups,
      this.postProcessors
    );

    if (candidates.length === 0) {
      this.logger.debug({ namespace, region, operation, paramName }, 'no cached values to infer parameter from');
      return null;
    }

    const outputs: OperationOutput[] = [];
    let lastError: unknown = null;

    for (const value of candidates) {
      const [ok, err, result] = await tryFn(() => this.invoke(client, operation, { [paramName]: value }));
      if (ok) {
        outputs.push(result);
      } else {
        lastError = err;
        this.logger.debug({ namespace, region, operation, paramName, value, err: err.message }, 'follow-up call failed');
      }
    }

    const inferredParams = { [paramName]: candidates };

    if (outputs.length === 0) {
      return { ...this.failure(namespace, region, operation, descriptor, lastError), inferredParams };
    }

    const payload: PagedPayload = { pageCount: outputs.length, pages: outputs };
    this.remember(operation, descriptor, payload);
    return { ...this.success(client, operation, false, payload), inferredParams };
  }

  private async executeWithoutRequired(
    client: OperationClient,
    operation: string,
    descriptor: OperationDescriptor
  ): Promise<ResultEnvelope | null> {
    const { namespace, region } = client;
    if (!this.settings.attemptMultiParamOperations) {
      return null;
    }

    const [ok, err, payload] = await tryFn(() => this.callAndPaginate(client, operation, descriptor, {}));
    if (!ok) {
      this.logger.debug(
        { namespace, region, operation, required: descriptor.requiredParams.length, err: err.message },
        'operation needs its required parameters, skipped'
      );
      return null;
    }

    this.remember(operation, descriptor, payload);
    return {
      ...this.success(client, operation, descriptor.paginated, payload),
      note: 'Executed without required params (API accepted)',
    };
  }

  private async invoke(client: OperationClient, operation: string, input: OperationInput): Promise<OperationOutput> {
    const { value } = await callWithRetry(() => client.call(operation, input), {
      operation,
      maxRetries: this.settings.maxRetries,
      baseDelayMs: this.settings.retryBaseDelayMs,
      operationTimeoutMs: this.settings.operationTimeoutMs,
      sleep: this.sleep,
      now: this.now,
      logger: this.logger,
    });
    return value;
  }

  private async callAndPaginate(
    client: OperationClient,
    operation: string,
    descriptor: OperationDescriptor,
    input: OperationInput
  ): Promise<EnvelopePayload> {
    const first = await this.invoke(client, operation, input);
    if (!descriptor.paginated) {
      return first;
    }
    return this.paginate(client, operation, descriptor, input, first);
  }

  /**
   * Resumes from the first page's continuation token. Pages read before a
   * pagination failure are kept.
   */
  private async paginate(
    client: OperationClient,
    operation: string,
    descriptor: OperationDescriptor,
    input: OperationInput,
    first: OperationOutput
  ): Promise<PagedPayload> {
    const maxPages = this.singlePageOperations.has(operation) ? 1 : this.settings.maxPages;
    const pages: OperationOutput[] = [first];
    const token = continuationToken(first, descriptor);
    const paginator = client.getPaginator(operation);

    if (token && paginator && pages.length < maxPages) {
      try {
        for await (const page of paginator(input, { startingToken: token })) {
          pages.push(page);
          if (pages.length >= maxPages) break;
        }
      } catch (err) {
        this.logger.debug(
          { namespace: client.namespace, region: client.region, operation, pages: pages.length, err },
          'pagination stopped early'
        );
      }
    }

    return { pageCount: pages.length, pages };
  }

  private remember(operation: string, descriptor: OperationDescriptor, payload: EnvelopePayload): void {
    if (descriptor.kind === 'list') {
      this.cache.set(operation, flattenItems(payload));
    }
  }

  private success(
    client: OperationClient,
    operation: string,
    paginated: boolean,
    payload: EnvelopePayload
  ): ResultEnvelope {
    return {
      namespace: client.namespace,
      region: client.region,
      operation,
      timestamp: new Date(this.now()).toISOString(),
      success: true,
      paginated,
      notAvailable: false,
      payload,
    };
  }

  private failure(
    namespace: string,
    region: string,
    operation: string,
    descriptor: OperationDescriptor,
    err: unknown
  ): ResultEnvelope {
    const classification = CallErrorClassifier.classify(err);
    this.logFailure(namespace, region, operation, classification);
    return {
      namespace,
      region,
      operation,
      timestamp: new Date(this.now()).toISOString(),
      success: false,
      paginated: descriptor.paginated,
      notAvailable: classification.notAvailable,
      error: { code: classification.code, message: classification.message, kind: classification.kind },
    };
  }

  private logFailure(namespace: string, region: string, operation: string, classification: CallErrorClassification): void {
    const context = { namespace, region, operation, code: classification.code, kind: classification.kind };
    if (classification.kind === 'throttling' || (classification.kind === 'unexpected' && !classification.expected)) {
      this.logger.warn({ ...context, message: classification.message }, 'operation failed');
    } else {
      this.logger.debug(context, 'operation failed');
    }
  }
}

function continuationToken(page: OperationOutput, descriptor: OperationDescriptor): string | null {
  const declared = descriptor.pagination?.outputToken;
  if (declared) {
    const value = page[declared];
    if (typeof value === 'string' && value !== '') return value;
  }
  for (const [key, value] of Object.entries(page)) {
    if (isContinuationMember(key) && typeof value === 'string' && value !== '') return value;
  }
  return null;
}
