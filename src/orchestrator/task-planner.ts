import type { OperationDescriptor } from '../catalog/operation-catalog-builder.class.js';
import type { NamespacePolicies } from './namespace-policies.js';

export interface Task {
  readonly namespace: string;
  readonly region: string;
  readonly global: boolean;
}

export interface NamespaceFilters {
  allow?: readonly string[];
  deny?: readonly string[];
}

function normaliseName(name: string): string {
  return name.trim().toLowerCase();
}

export function shouldCollect(namespace: string, filters: NamespaceFilters = {}): boolean {
  const name = normaliseName(namespace);
  const deny = new Set((filters.deny ?? []).map(normaliseName));
  const allow = new Set((filters.allow ?? []).map(normaliseName));
  if (deny.has(name)) return false;
  if (allow.size > 0 && !allow.has(name)) return false;
  return true;
}

/**
 * One task per (namespace, region); global namespaces get a single task
 * pinned to `globalRegion` whatever regions were requested.
 */
export function planTasks(
  namespaces: readonly string[],
  regions: readonly string[],
  policies: NamespacePolicies,
  filters: NamespaceFilters = {},
  globalRegion = 'us-east-1'
): Task[] {
  const uniqueRegions = [...new Set(regions)];
  const tasks: Task[] = [];
  const seen = new Set<string>();

  for (const namespace of namespaces) {
    if (seen.has(namespace) || !shouldCollect(namespace, filters)) continue;
    seen.add(namespace);

    if (policies.globalNamespaces.has(namespace)) {
      tasks.push(Object.freeze({ namespace, region: globalRegion, global: true }));
      continue;
    }
    for (const region of uniqueRegions) {
      tasks.push(Object.freeze({ namespace, region, global: false }));
    }
  }

  return tasks;
}

/**
 * Priority names first, in priority-list order; the rest keep discovery order.
 */
export function orderOperations(
  operations: readonly OperationDescriptor[],
  priority: readonly string[] = []
): OperationDescriptor[] {
  const byName = new Map(operations.map((operation) => [operation.name, operation]));
  const first: OperationDescriptor[] = [];
  const picked = new Set<string>();

  for (const name of priority) {
    const operation = byName.get(name);
    if (operation && !picked.has(name)) {
      first.push(operation);
      picked.add(name);
    }
  }

  return [...first, ...operations.filter((operation) => !picked.has(operation.name))];
}

export interface BudgetSelection {
  selected: OperationDescriptor[];
  skipped: OperationDescriptor[];
}

/**
 * Keeps the first `budget` operations. Priority operations are always kept
 * and count toward the budget.
 */
export function applyOperationBudget(
  operations: readonly OperationDescriptor[],
  budget: number,
  priority: readonly string[] = []
): BudgetSelection {
  const prioritySet = new Set(priority);
  const selected: OperationDescriptor[] = [];
  const skipped: OperationDescriptor[] = [];

  for (const operation of operations) {
    if (prioritySet.has(operation.name) || selected.length < budget) {
      selected.push(operation);
    } else {
      skipped.push(operation);
    }
  }

  return { selected, skipped };
}
