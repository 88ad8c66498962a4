import Validator from 'fastest-validator';
import { dataFilePath, readJsonFile } from '../concerns/data-files.js';
import { ConfigError } from '../errors.js';

export interface NamespacePolicies {
  /** Namespaces not partitioned by region. */
  globalNamespaces: ReadonlySet<string>;
  /** Per-namespace operations always run first and never dropped by the budget. */
  priorities: ReadonlyMap<string, readonly string[]>;
  operationBudgets: ReadonlyMap<string, number>;
  singlePageOperations: ReadonlySet<string>;
}

const POLICIES_SCHEMA = {
  $$root: true,
  type: 'object',
  props: {
    version: { type: 'number', optional: true },
    globalNamespaces: { type: 'array', items: 'string' },
    priorities: { type: 'record', key: { type: 'string' }, value: { type: 'array', items: 'string' } },
    operationBudgets: { type: 'record', key: { type: 'string' }, value: { type: 'number', integer: true, min: 1 } },
    singlePageOperations: { type: 'array', items: 'string' },
  },
};

const checkPolicies = new Validator().compile(POLICIES_SCHEMA);

export const EMPTY_POLICIES: NamespacePolicies = Object.freeze({
  globalNamespaces: new Set<string>(),
  priorities: new Map<string, readonly string[]>(),
  operationBudgets: new Map<string, number>(),
  singlePageOperations: new Set<string>(),
});

function strings(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((entry): entry is string => typeof entry === 'string') : [];
}

function entries(value: unknown): Array<[string, unknown]> {
  return typeof value === 'object' && value !== null ? Object.entries(value) : [];
}

export function parseNamespacePolicies(document: unknown, source = 'namespace policies'): NamespacePolicies {
  const result = checkPolicies(document);
  if (result !== true) {
    const problems = Array.isArray(result) ? result.map((issue) => issue.message ?? issue.field) : [];
    throw new ConfigError(`Invalid ${source}: ${problems.join('; ')}`, { problems });
  }

  const record: Record<string, unknown> = Object.fromEntries(entries(document));
  const get = (key: string): unknown => record[key];

  const priorities = new Map<string, readonly string[]>();
  for (const [namespace, operations] of entries(get('priorities'))) {
    priorities.set(namespace, Object.freeze(strings(operations)));
  }

  const operationBudgets = new Map<string, number>();
  for (const [namespace, budget] of entries(get('operationBudgets'))) {
    if (typeof budget === 'number') operationBudgets.set(namespace, budget);
  }

  return {
    globalNamespaces: new Set(strings(get('globalNamespaces'))),
    priorities,
    operationBudgets,
    singlePageOperations: new Set(strings(get('singlePageOperations'))),
  };
}

export function loadNamespacePolicies(path: string = dataFilePath('namespace-policies.json')): NamespacePolicies {
  return parseNamespacePolicies(readJsonFile(path), path);
}

/**
 * Budget for a namespace: config overrides, then policy overrides, then the default.
 */
export function operationBudgetFor(
  namespace: string,
  policies: NamespacePolicies,
  defaultBudget: number,
  configOverrides: Readonly<Record<string, number>> = {}
): number {
  return configOverrides[namespace] ?? policies.operationBudgets.get(namespace) ?? defaultBudget;
}
