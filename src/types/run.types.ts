import type { CallerIdentity } from '../clients/types.js';
import type { InventoryConfig } from '../config/inventory-config.js';

export interface TaskErrorRecord {
  namespace: string;
  region: string;
  error: string;
  code?: string;
}

export type TaskStatus =
  | 'completed'
  | 'empty'
  | 'unavailable'
  | 'fast-failed'
  | 'budget-exceeded'
  | 'cancelled'
  | 'crashed';

export interface TaskReport {
  namespace: string;
  region: string;
  status: TaskStatus;
  /** Operations in the catalog after classification. */
  operations: number;
  executed: number;
  skipped: number;
  elapsedMs: number;
}

export interface RunCounters {
  executed: number;
  successful: number;
  failed: number;
  unavailable: number;
  /** Operations never executed: budget, time, fast-fail or no inferable parameter. */
  skipped: number;
  skippedTasks: number;
  errors: TaskErrorRecord[];
}

export interface RunSummary extends RunCounters {
  runId: string;
  startedAt: string;
  finishedAt: string;
  elapsedMs: number;
  tasks: number;
  stopped: boolean;
  unavailableEndpoints: string[];
  taskReports: TaskReport[];
}

export interface RunMetadata {
  runId: string;
  createdAt: string;
  identity: CallerIdentity;
  regions: string[];
  namespaces: string[];
  settings: Omit<InventoryConfig, 'credentials'>;
}
