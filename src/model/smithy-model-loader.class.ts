import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tryFn } from '../concerns/try-fn.js';
import { ModelLoadError } from '../errors.js';
import type {
  PaginationTrait,
  ServiceModel,
  ServiceModelLoader,
  ServiceOperationModel,
  ShapeMember,
  ShapeModel,
} from './service-model.js';

const PRELUDE_PREFIX = 'smithy.api#';
const UNIT_SHAPE = 'smithy.api#Unit';
const REQUIRED_TRAIT = 'smithy.api#required';
const PAGINATED_TRAIT = 'smithy.api#paginated';

interface SmithyMember {
  target: string;
  traits: Record<string, unknown>;
}

interface SmithyShape {
  type: string;
  input?: string;
  output?: string;
  members: Record<string, SmithyMember>;
  traits: Record<string, unknown>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readTarget(value: unknown): string | undefined {
  return isRecord(value) && typeof value.target === 'string' ? value.target : undefined;
}

function readShape(raw: unknown): SmithyShape | null {
  if (!isRecord(raw) || typeof raw.type !== 'string') return null;

  const members: Record<string, SmithyMember> = {};
  if (isRecord(raw.members)) {
    for (const [name, member] of Object.entries(raw.members)) {
      const target = readTarget(member);
      if (!target || !isRecord(member)) continue;
      members[name] = { target, traits: isRecord(member.traits) ? member.traits : {} };
    }
  }

  return {
    type: raw.type,
    input: readTarget(raw.input),
    output: readTarget(raw.output),
    members,
    traits: isRecord(raw.traits) ? raw.traits : {},
  };
}

function readPagination(value: unknown): PaginationTrait | undefined {
  if (!isRecord(value)) return undefined;
  const pick = (key: string): string | undefined => {
    const entry = value[key];
    return typeof entry === 'string' ? entry : undefined;
  };
  return {
    inputToken: pick('inputToken'),
    outputToken: pick('outputToken'),
    items: pick('items'),
    pageSize: pick('pageSize'),
  };
}

function localName(shapeId: string): string {
  const hash = shapeId.indexOf('#');
  return hash === -1 ? shapeId : shapeId.slice(hash + 1);
}

/**
 * Reads `<modelsDir>/<namespace>.json` files in the Smithy 2.0 JSON AST
 * format the AWS SDK publishes.
 */
export class SmithyModelLoader implements ServiceModelLoader {
  readonly modelsDir: string;

  constructor(modelsDir: string) {
    this.modelsDir = modelsDir;
  }

  async listNamespaces(): Promise<string[]> {
    const [ok, err, entries] = await tryFn(readdir(this.modelsDir));
    if (!ok) {
      throw new ModelLoadError(`Unable to list models directory ${this.modelsDir}`, { namespace: '*', original: err });
    }
    return entries
      .filter((entry) => entry.endsWith('.json'))
      .map((entry) => entry.slice(0, -'.json'.length))
      .sort();
  }

  async loadNamespace(namespace: string): Promise<ServiceModel> {
    const path = join(this.modelsDir, `${namespace}.json`);
    const [readOk, readErr, text] = await tryFn(readFile(path, 'utf8'));
    if (!readOk) {
      throw new ModelLoadError(`Unable to read model for ${namespace}`, { namespace, original: readErr, path });
    }

    let document: unknown;
    try {
      document = JSON.parse(text);
    } catch (err) {
      throw new ModelLoadError(`Model for ${namespace} is not valid JSON`, { namespace, original: err, path });
    }

    if (!isRecord(document) || !isRecord(document.shapes)) {
      throw new ModelLoadError(`Model for ${namespace} has no "shapes" section`, { namespace, path });
    }

    const shapes = new Map<string, SmithyShape>();
    for (const [id, raw] of Object.entries(document.shapes)) {
      const shape = readShape(raw);
      if (shape) shapes.set(id, shape);
    }

    let servicePagination: PaginationTrait | undefined;
    for (const shape of shapes.values()) {
      if (shape.type === 'service') {
        servicePagination = readPagination(shape.traits[PAGINATED_TRAIT]);
      }
    }

    const operations: ServiceOperationModel[] = [];
    for (const [id, shape] of shapes) {
      if (shape.type !== 'operation') continue;
      operations.push(this.buildOperation(localName(id), shape, shapes, servicePagination));
    }

    return { namespace, operations };
  }

  private buildOperation(
    name: string,
    shape: SmithyShape,
    shapes: Map<string, SmithyShape>,
    servicePagination: PaginationTrait | undefined
  ): ServiceOperationModel {
    const operation: ServiceOperationModel = { name };

    const paginated = readPagination(shape.traits[PAGINATED_TRAIT]);
    if (paginated) {
      operation.pagination = {
        inputToken: paginated.inputToken ?? servicePagination?.inputToken,
        outputToken: paginated.outputToken ?? servicePagination?.outputToken,
        items: paginated.items,
        pageSize: paginated.pageSize ?? servicePagination?.pageSize,
      };
    }

    try {
      if (shape.input && shape.input !== UNIT_SHAPE) {
        operation.input = this.resolveStructure(shape.input, shapes);
      }
      if (shape.output && shape.output !== UNIT_SHAPE) {
        operation.output = this.resolveStructure(shape.output, shapes);
      }
    } catch (err) {
      operation.error = err instanceof Error ? err.message : String(err);
    }

    return operation;
  }

  private resolveStructure(shapeId: string, shapes: Map<string, SmithyShape>): ShapeModel {
    const shape = shapes.get(shapeId);
    if (!shape) {
      throw new Error(`Shape ${shapeId} is not defined`);
    }

    const members: Record<string, ShapeMember> = {};
    for (const [memberName, member] of Object.entries(shape.members)) {
      members[memberName] = {
        type: this.resolveType(member.target, shapes),
        required: REQUIRED_TRAIT in member.traits,
      };
    }
    return { members };
  }

  private resolveType(target: string, shapes: Map<string, SmithyShape>): string {
    if (target.startsWith(PRELUDE_PREFIX)) {
      return localName(target).toLowerCase();
    }
    const shape = shapes.get(target);
    if (!shape) {
      throw new Error(`Member target ${target} is not defined`);
    }
    return shape.type;
  }
}
