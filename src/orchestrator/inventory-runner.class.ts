import { PromisePool } from '@supercharge/promise-pool';
import { nanoid } from 'nanoid';

import { OperationCatalogBuilder } from '../catalog/operation-catalog-builder.class.js';
import type { ClassificationRules } from '../catalog/classification.js';
import type { CallerIdentity, ClientProvider } from '../clients/types.js';
import type { InventoryConfig } from '../config/inventory-config.js';
import type { Logger } from '../concerns/logger.js';
import { getGlobalLogger } from '../concerns/logger.js';
import { tryFn } from '../concerns/try-fn.js';
import { BaseError, CredentialsError } from '../errors.js';
import { OperationExecutor } from '../execution/operation-executor.class.js';
import type { CandidatePostProcessor } from '../execution/parameter-inference.js';
import type { ServiceModelLoader } from '../model/service-model.js';
import type { ResultStorage } from '../storage/result-storage.js';
import type { RunMetadata, RunSummary, TaskReport } from '../types/run.types.js';
import { loadNamespacePolicies, operationBudgetFor, type NamespacePolicies } from './namespace-policies.js';
import { RunState } from './run-state.class.js';
import { applyOperationBudget, orderOperations, planTasks, type Task } from './task-planner.js';

export interface InventoryRunnerOptions {
  config: InventoryConfig;
  loader: ServiceModelLoader;
  clientProvider: ClientProvider;
  storage: ResultStorage;
  policies?: NamespacePolicies;
  rules?: ClassificationRules;
  postProcessors?: ReadonlyMap<string, CandidatePostProcessor>;
  logger?: Logger;
  runId?: string;
  /** Identity already resolved by the caller, e.g. to name the run directory. */
  identity?: CallerIdentity;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

const ALL_REGIONS = 'all';

/**
 * Plans (namespace, region) tasks and runs them on a bounded pool.
 */
export class InventoryRunner {
  readonly state = new RunState();
  private readonly options: InventoryRunnerOptions;
  private readonly config: InventoryConfig;
  private readonly policies: NamespacePolicies;
  private readonly catalogBuilder: OperationCatalogBuilder;
  private readonly logger: Logger;
  private readonly now: () => number;
  private stopped = false;

  constructor(options: InventoryRunnerOptions) {
    this.options = options;
    this.config = options.config;
    this.policies = options.policies ?? loadNamespacePolicies();
    this.logger = options.logger ?? getGlobalLogger();
    this.now = options.now ?? Date.now;
    this.catalogBuilder = new OperationCatalogBuilder({
      loader: options.loader,
      rules: options.rules,
      logger: this.logger,
    });
  }

  /** Stops scheduling new tasks. Tasks already running finish. */
  stop(): void {
    if (!this.stopped) {
      this.stopped = true;
      this.logger.info('stop requested, waiting for running tasks');
    }
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  async run(): Promise<RunSummary> {
    const startedAt = this.now();
    const identity = await this.resolveIdentity();
    const runId = this.options.runId ?? nanoid();
    const regions = await this.resolveRegions();
    const namespaces = await this.options.loader.listNamespaces();
    const tasks = planTasks(
      namespaces,
      regions,
      this.policies,
      { allow: this.config.allow, deny: this.config.deny },
      this.config.globalRegion
    );

    this.logger.info({ runId, namespaces: namespaces.length, regions, tasks: tasks.length }, 'inventory run started');
    await this.options.storage.writeMetadata(this.buildMetadata(runId, identity, regions, namespaces, startedAt));

    const crashed: TaskReport[] = [];
    const { results } = await PromisePool.for(tasks)
      .withConcurrency(this.config.concurrency)
      .handleError(async (error: Error, task) => {
        this.logger.error({ namespace: task.namespace, region: task.region, err: error }, 'task crashed');
        this.state.recordError({
          namespace: task.namespace,
          region: task.region,
          error: error.message,
          ...(error instanceof BaseError ? { code: error.code } : {}),
        });
        crashed.push({
          namespace: task.namespace,
          region: task.region,
          status: 'crashed',
          operations: 0,
          executed: 0,
          skipped: 0,
          elapsedMs: 0,
        });
      })
      .process(async (task) => this.runTask(task));

    const finishedAt = this.now();
    const counters = this.state.snapshot();
    const summary: RunSummary = {
      runId,
      startedAt: new Date(startedAt).toISOString(),
      finishedAt: new Date(finishedAt).toISOString(),
      elapsedMs: finishedAt - startedAt,
      tasks: tasks.length,
      ...counters,
      stopped: this.stopped,
      unavailableEndpoints: this.state.unavailable.values(),
      taskReports: [...results, ...crashed],
    };

    await this.options.storage.writeSummary(summary);
    this.logger.info(
      {
        runId,
        executed: summary.executed,
        successful: summary.successful,
        failed: summary.failed,
        unavailable: summary.unavailable,
        skipped: summary.skipped,
        errors: summary.errors.length,
        elapsedMs: summary.elapsedMs,
      },
      'inventory run finished'
    );
    return summary;
  }

  /**
   * Runs the operations of one (namespace, region) in priority order under
   * the task time budget and the namespace operation budget.
   */
  async runTask(task: Task): Promise<TaskReport> {
    const { namespace, region } = task;
    const startedAt = this.now();
    const report = (status: TaskReport['status'], operations: number, executed: number, skipped: number): TaskReport => ({
      namespace,
      region,
      status,
      operations,
      executed,
      skipped,
      elapsedMs: this.now() - startedAt,
    });

    if (this.stopped) {
      this.state.recordSkippedTask();
      return report('cancelled', 0, 0, 0);
    }

    if (this.state.unavailable.has(namespace, region)) {
      this.state.recordSkippedTask();
      return report('unavailable', 0, 0, 0);
    }

    const catalog = await this.catalogBuilder.build(namespace);
    if (catalog.operations.length === 0) {
      return report('empty', 0, 0, 0);
    }

    const priority = this.policies.priorities.get(namespace) ?? [];
    const ordered = orderOperations(catalog.operations, priority);
    const budget = operationBudgetFor(
      namespace,
      this.policies,
      this.config.operationBudget,
      this.config.operationBudgetOverrides
    );
    const { selected, skipped: overBudget } = applyOperationBudget(ordered, budget, priority);
    this.state.recordSkipped(overBudget.length);

    const log = this.logger.child({ namespace, region });
    const executor = new OperationExecutor({
      clientProvider: this.options.clientProvider,
      settings: this.config,
      singlePageOperations: this.policies.singlePageOperations,
      postProcessors: this.options.postProcessors,
      logger: log,
      sleep: this.options.sleep,
      now: this.now,
    });

    let status: TaskReport['status'] = 'completed';
    let executed = 0;
    let skipped = overBudget.length;

    try {
      for (let index = 0; index < selected.length; index++) {
        const descriptor = selected[index];
        if (!descriptor) continue;

        if (this.now() - startedAt > this.config.taskTimeBudgetMs) {
          const remaining = selected.length - index;
          this.state.recordSkipped(remaining);
          skipped += remaining;
          status = 'budget-exceeded';
          log.warn({ remaining, budgetMs: this.config.taskTimeBudgetMs }, 'task time budget exceeded');
          break;
        }

        if (!this.state.claimOperation(namespace, region, descriptor.name)) {
          this.state.recordSkipped();
          skipped++;
          continue;
        }

        const envelope = await executor.execute(namespace, region, descriptor.name, descriptor);
        if (!envelope) {
          this.state.recordSkipped();
          skipped++;
          continue;
        }

        const isFirstResult = executed === 0;
        await this.options.storage.put(envelope);
        this.state.recordEnvelope(envelope);
        executed++;

        if (isFirstResult && envelope.notAvailable) {
          const remaining = selected.length - index - 1;
          this.state.unavailable.add(namespace, region);
          this.state.recordSkipped(remaining);
          skipped += remaining;
          status = 'fast-failed';
          log.debug({ operation: descriptor.name, code: envelope.error?.code }, 'endpoint unavailable, task fast-failed');
          break;
        }
      }
    } finally {
      await executor.destroy();
    }

    return report(status, catalog.operations.length, executed, skipped);
  }

  private async resolveIdentity(): Promise<CallerIdentity> {
    if (this.options.identity) return this.options.identity;

    const [ok, err, identity] = await tryFn(() => this.options.clientProvider.identify());
    if (ok) return identity;
    if (err instanceof CredentialsError) throw err;

    this.logger.warn({ err }, 'caller identity unavailable, continuing without account metadata');
    return {};
  }

  private async resolveRegions(): Promise<string[]> {
    const requested = this.config.regions;
    const provider = this.options.clientProvider;
    if (!requested.includes(ALL_REGIONS)) return [...new Set(requested)];

    if (!provider.listRegions) {
      this.logger.warn({ fallback: this.config.globalRegion }, 'region listing not supported, using the global region');
      return [this.config.globalRegion];
    }
    const regions = await provider.listRegions();
    this.logger.info({ regions: regions.length }, 'using every enabled region');
    return regions;
  }

  private buildMetadata(
    runId: string,
    identity: CallerIdentity,
    regions: string[],
    namespaces: string[],
    startedAt: number
  ): RunMetadata {
    const { credentials: _credentials, ...settings } = this.config;
    return {
      runId,
      createdAt: new Date(startedAt).toISOString(),
      identity,
      regions,
      namespaces,
      settings,
    };
  }
}
