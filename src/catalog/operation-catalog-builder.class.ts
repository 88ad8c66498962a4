import type { Logger } from '../concerns/logger.js';
import { getGlobalLogger } from '../concerns/logger.js';
import { tryFn } from '../concerns/try-fn.js';
import type { PaginationTrait, ServiceModelLoader, ServiceOperationModel } from '../model/service-model.js';
import {
  classifyOperation,
  getDefaultClassificationRules,
  isPaginatedOutput,
  operationKind,
  type ClassificationRules,
  type OperationClassification,
  type OperationKind,
} from './classification.js';

export interface OperationParam {
  readonly name: string;
  readonly type: string;
}

export interface OperationDescriptor {
  readonly name: string;
  readonly requiredParams: readonly OperationParam[];
  readonly optionalParams: readonly OperationParam[];
  readonly safeToCall: boolean;
  readonly paginated: boolean;
  readonly classification: OperationClassification;
  readonly kind: OperationKind;
  readonly pagination?: Readonly<PaginationTrait>;
}

export interface OperationCatalog {
  namespace: string;
  operations: readonly OperationDescriptor[];
  /** Operations present in the model. */
  discovered: number;
  /** Operations dropped for unresolvable shapes or a non-read classification. */
  dropped: number;
}

export interface OperationCatalogBuilderOptions {
  loader: ServiceModelLoader;
  rules?: ClassificationRules;
  logger?: Logger;
}

export function buildDescriptor(
  operation: ServiceOperationModel,
  rules: ClassificationRules = getDefaultClassificationRules()
): OperationDescriptor {
  const requiredParams: OperationParam[] = [];
  const optionalParams: OperationParam[] = [];

  for (const [name, member] of Object.entries(operation.input?.members ?? {})) {
    const param = Object.freeze({ name, type: member.type });
    if (member.required) {
      requiredParams.push(param);
    } else {
      optionalParams.push(param);
    }
  }

  const outputMembers = Object.keys(operation.output?.members ?? {});

  return Object.freeze({
    name: operation.name,
    requiredParams: Object.freeze(requiredParams),
    optionalParams: Object.freeze(optionalParams),
    safeToCall: requiredParams.length === 0,
    paginated: operation.pagination !== undefined || isPaginatedOutput(outputMembers),
    classification: classifyOperation(operation.name, rules),
    kind: operationKind(operation.name),
    ...(operation.pagination ? { pagination: Object.freeze({ ...operation.pagination }) } : {}),
  });
}

/**
 * Builds the read-only operation catalog of a namespace, once per builder.
 * Concurrent callers for the same namespace share one build.
 */
export class OperationCatalogBuilder {
  private readonly loader: ServiceModelLoader;
  private readonly rules: ClassificationRules;
  private readonly logger: Logger;
  private readonly cache = new Map<string, Promise<OperationCatalog>>();

  constructor(options: OperationCatalogBuilderOptions) {
    this.loader = options.loader;
    this.rules = options.rules ?? getDefaultClassificationRules();
    this.logger = options.logger ?? getGlobalLogger();
  }

  build(namespace: string): Promise<OperationCatalog> {
    let pending = this.cache.get(namespace);
    if (!pending) {
      pending = this.buildUncached(namespace);
      this.cache.set(namespace, pending);
    }
    return pending;
  }

  private async buildUncached(namespace: string): Promise<OperationCatalog> {
    const [ok, err, model] = await tryFn(() => this.loader.loadNamespace(namespace));
    if (!ok) {
      this.logger.warn({ namespace, err }, 'service model unavailable, namespace skipped');
      return { namespace, operations: [], discovered: 0, dropped: 0 };
    }

    const operations: OperationDescriptor[] = [];
    let dropped = 0;

    for (const operation of model.operations) {
      if (operation.error) {
        this.logger.debug({ namespace, operation: operation.name, reason: operation.error }, 'operation shape unresolved');
        dropped++;
        continue;
      }
      const descriptor = buildDescriptor(operation, this.rules);
      if (descriptor.classification !== 'read') {
        dropped++;
        continue;
      }
      operations.push(descriptor);
    }

    this.logger.debug({ namespace, discovered: model.operations.length, retained: operations.length }, 'catalog built');

    return {
      namespace,
      operations: Object.freeze(operations),
      discovered: model.operations.length,
      dropped,
    };
  }
}
