import Validator from 'fastest-validator';
import { dataFilePath, readJsonFile } from '../concerns/data-files.js';
import { ConfigError } from '../errors.js';

export type OperationClassification = 'read' | 'write' | 'unknown';
export type OperationKind = 'list' | 'get' | 'other';

export interface ClassificationRules {
  overrides: ReadonlyMap<string, OperationClassification>;
  knownRead: ReadonlySet<string>;
  readPrefixes: readonly string[];
  writePrefixes: readonly string[];
}

const RULES_SCHEMA = {
  $$root: true,
  type: 'object',
  props: {
    version: { type: 'number', optional: true },
    overrides: { type: 'record', key: { type: 'string' }, value: { type: 'enum', values: ['read', 'write', 'unknown'] } },
    knownRead: { type: 'array', items: 'string' },
    readPrefixes: { type: 'array', items: { type: 'string', empty: false }, min: 1 },
    writePrefixes: { type: 'array', items: { type: 'string', empty: false }, min: 1 },
  },
};

const checkRules = new Validator().compile(RULES_SCHEMA);

const CONTINUATION_MEMBERS = new Set([
  'NextToken',
  'Marker',
  'NextMarker',
  'NextPageToken',
  'nextToken',
  'nextPageToken',
  'ContinuationToken',
  'NextContinuationToken',
]);

const BULK_MEMBERS = new Set(['items', 'results', 'list', 'values']);

function isClassification(value: unknown): value is OperationClassification {
  return value === 'read' || value === 'write' || value === 'unknown';
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((entry): entry is string => typeof entry === 'string') : [];
}

/**
 * Validates a rules document and indexes it. Prefixes are matched against
 * lowercased operation names, so they are lowercased here too.
 */
export function parseClassificationRules(document: unknown, source = 'classification rules'): ClassificationRules {
  const result = checkRules(document);
  if (result !== true) {
    const problems = Array.isArray(result) ? result.map((issue) => issue.message ?? issue.field) : [];
    throw new ConfigError(`Invalid ${source}: ${problems.join('; ')}`, { problems });
  }
  if (typeof document !== 'object' || document === null) {
    throw new ConfigError(`Invalid ${source}: expected an object`);
  }

  const overrides = new Map<string, OperationClassification>();
  const rawOverrides = 'overrides' in document ? document.overrides : undefined;
  if (typeof rawOverrides === 'object' && rawOverrides !== null) {
    for (const [name, classification] of Object.entries(rawOverrides)) {
      if (isClassification(classification)) overrides.set(name, classification);
    }
  }

  return {
    overrides,
    knownRead: new Set(stringList('knownRead' in document ? document.knownRead : undefined)),
    readPrefixes: stringList('readPrefixes' in document ? document.readPrefixes : undefined).map((p) => p.toLowerCase()),
    writePrefixes: stringList('writePrefixes' in document ? document.writePrefixes : undefined).map((p) => p.toLowerCase()),
  };
}

export function loadClassificationRules(path: string = dataFilePath('classification-rules.json')): ClassificationRules {
  return parseClassificationRules(readJsonFile(path), path);
}

let defaultRules: ClassificationRules | null = null;

export function getDefaultClassificationRules(): ClassificationRules {
  if (!defaultRules) {
    defaultRules = loadClassificationRules();
  }
  return defaultRules;
}

/**
 * Read/write classification of an operation name. Unmatched names are
 * treated as writes.
 */
export function classifyOperation(
  name: string,
  rules: ClassificationRules = getDefaultClassificationRules()
): OperationClassification {
  const override = rules.overrides.get(name);
  if (override) return override;

  if (rules.knownRead.has(name)) return 'read';

  const lower = name.toLowerCase();
  if (rules.readPrefixes.some((prefix) => lower.startsWith(prefix))) return 'read';
  if (rules.writePrefixes.some((prefix) => lower.startsWith(prefix))) return 'write';

  return 'write';
}

export function operationKind(name: string): OperationKind {
  const lower = name.toLowerCase();
  if (lower.startsWith('list') || lower.startsWith('describe')) return 'list';
  if (lower.startsWith('get')) return 'get';
  return 'other';
}

export function isPaginatedOutput(memberNames: Iterable<string>): boolean {
  for (const member of memberNames) {
    if (CONTINUATION_MEMBERS.has(member)) return true;
    if (BULK_MEMBERS.has(member.toLowerCase())) return true;
  }
  return false;
}

export function isContinuationMember(name: string): boolean {
  return CONTINUATION_MEMBERS.has(name);
}
