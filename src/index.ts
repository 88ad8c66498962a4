// =============================================================================
// Orchestration
// =============================================================================

export { InventoryRunner, type InventoryRunnerOptions } from './orchestrator/inventory-runner.class.js';
export { RunState, UnavailableEndpointSet } from './orchestrator/run-state.class.js';
export {
  planTasks,
  shouldCollect,
  orderOperations,
  applyOperationBudget,
  type Task,
  type NamespaceFilters,
  type BudgetSelection,
} from './orchestrator/task-planner.js';
export {
  loadNamespacePolicies,
  parseNamespacePolicies,
  operationBudgetFor,
  EMPTY_POLICIES,
  type NamespacePolicies,
} from './orchestrator/namespace-policies.js';

// =============================================================================
// Catalog & Models
// =============================================================================

export {
  OperationCatalogBuilder,
  buildDescriptor,
  type OperationCatalog,
  type OperationDescriptor,
  type OperationParam,
} from './catalog/operation-catalog-builder.class.js';
export {
  classifyOperation,
  operationKind,
  isPaginatedOutput,
  loadClassificationRules,
  parseClassificationRules,
  getDefaultClassificationRules,
  type ClassificationRules,
  type OperationClassification,
  type OperationKind,
} from './catalog/classification.js';
export { SmithyModelLoader } from './model/smithy-model-loader.class.js';
export type * from './model/service-model.js';

// =============================================================================
// Execution
// =============================================================================

export { OperationExecutor, type ExecutorSettings } from './execution/operation-executor.class.js';
export { ResultsCache, flattenItems } from './execution/results-cache.class.js';
export { inferCandidates, candidateFields, DEFAULT_POST_PROCESSORS } from './execution/parameter-inference.js';
export { callWithRetry, computeBackoff } from './execution/retry.js';

// =============================================================================
// Clients, Storage & Indexing
// =============================================================================

export { AwsClientProvider, buildCredentialProvider } from './clients/aws-client-provider.class.js';
export type * from './clients/types.js';
export type { ResultStorage, StoredEnvelope } from './storage/result-storage.js';
export { FileSystemResultStorage } from './storage/filesystem-result-storage.class.js';
export { MemoryResultStorage } from './storage/memory-result-storage.class.js';
export { resolveRunDir, runId } from './storage/run-dir.js';
export {
  ResourceIndexer,
  writeIndex,
  type InventoryIndex,
  type RegionIndexEntry,
} from './indexer/resource-indexer.class.js';
export { DEFAULT_RESOURCE_FILTERS, type ResourceFilter } from './indexer/resource-filters.js';

// =============================================================================
// Configuration, Errors & Logging
// =============================================================================

export { loadConfig, configFromEnv, DEFAULT_CONFIG, type InventoryConfig } from './config/inventory-config.js';
export * from './errors.js';
export { createLogger, getGlobalLogger, type Logger, type LogLevel } from './concerns/logger.js';
export { CallErrorClassifier } from './concerns/error-classifier.js';
export type * from './types/envelope.types.js';
export type * from './types/run.types.js';
