import Validator from 'fastest-validator';
import { dataFilePath, readJsonFile } from '../concerns/data-files.js';
import { ConfigError } from '../errors.js';

/**
 * Field-name tables used to find resources inside an operation payload.
 * Order matters: the first matching name wins.
 */
export interface ResourceFieldTable {
  collectionFields: readonly string[];
  identifierFields: readonly string[];
  singleResourceFields: readonly string[];
}

const FIELDS_SCHEMA = {
  $$root: true,
  type: 'object',
  props: {
    collectionFields: { type: 'array', items: { type: 'string', empty: false }, min: 1 },
    identifierFields: { type: 'array', items: { type: 'string', empty: false }, min: 1 },
    singleResourceFields: { type: 'array', items: { type: 'string', empty: false } },
  },
};

const checkFields = new Validator().compile(FIELDS_SCHEMA);

function stringList(document: object, key: string): string[] {
  const value: unknown = key in document ? Reflect.get(document, key) : undefined;
  if (!Array.isArray(value)) return [];
  return [...new Set(value.filter((entry): entry is string => typeof entry === 'string'))];
}

export function parseResourceFieldTable(document: unknown, source = 'resource field table'): ResourceFieldTable {
  const result = checkFields(document);
  if (result !== true) {
    const problems = Array.isArray(result) ? result.map((issue) => issue.message ?? issue.field) : [];
    throw new ConfigError(`Invalid ${source}: ${problems.join('; ')}`, { problems });
  }
  if (typeof document !== 'object' || document === null) {
    throw new ConfigError(`Invalid ${source}: expected an object`);
  }

  return {
    collectionFields: stringList(document, 'collectionFields'),
    identifierFields: stringList(document, 'identifierFields'),
    singleResourceFields: stringList(document, 'singleResourceFields'),
  };
}

export function loadResourceFieldTable(path: string = dataFilePath('resource-fields.json')): ResourceFieldTable {
  return parseResourceFieldTable(readJsonFile(path), path);
}

let defaultTable: ResourceFieldTable | null = null;

export function getDefaultResourceFieldTable(): ResourceFieldTable {
  if (!defaultTable) {
    defaultTable = loadResourceFieldTable();
  }
  return defaultTable;
}
