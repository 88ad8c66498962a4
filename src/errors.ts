/**
 * Inventory Error Classes
 *
 * Typed error hierarchy for inventory runs.
 */

export type StringRecord = Record<string, unknown>;

/** Base error context for all inventory errors */
export interface BaseErrorContext {
  message?: string;
  code?: string;
  statusCode?: number;
  requestId?: string;
  awsMessage?: string;
  original?: unknown;
  description?: string;
  suggestion?: string;
  retriable?: boolean;
  [key: string]: unknown;
}

/** Serialized error format */
export interface SerializedError {
  name: string;
  message: string;
  code?: string;
  statusCode: number;
  requestId?: string;
  awsMessage?: string;
  retriable: boolean;
  suggestion?: string;
  description?: string;
  data: StringRecord;
  original?: unknown;
  stack?: string;
}

export class BaseError extends Error {
  code?: string;
  statusCode: number;
  requestId?: string;
  awsMessage?: string;
  original?: unknown;
  description?: string;
  suggestion?: string;
  retriable: boolean;
  /** Extra context passed by the thrower, e.g. the problems a config check found. */
  data: StringRecord;

  constructor(context: BaseErrorContext) {
    const {
      message = 'Unknown error',
      code,
      statusCode,
      requestId,
      awsMessage,
      original,
      description,
      suggestion,
      retriable,
      ...rest
    } = context;

    super(message);
    Error.captureStackTrace(this, this.constructor);

    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode ?? 500;
    this.requestId = requestId;
    this.awsMessage = awsMessage;
    this.original = original;
    this.description = description;
    this.suggestion = suggestion;
    this.retriable = retriable ?? false;
    this.data = rest;
  }

  toJSON(): SerializedError {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      requestId: this.requestId,
      awsMessage: this.awsMessage,
      retriable: this.retriable,
      suggestion: this.suggestion,
      description: this.description,
      data: this.data,
      original: this.original,
      stack: this.stack,
    };
  }

  override toString(): string {
    return `${this.name} | ${this.message}`;
  }
}

/** Shape shared by AWS SDK v3 service exceptions and plain Node errors */
export interface AwsErrorLike {
  code?: string;
  Code?: string;
  name?: string;
  message?: string;
  statusCode?: number;
  stack?: string;
  $metadata?: {
    httpStatusCode?: number;
    requestId?: string;
    [key: string]: unknown;
  };
}

export interface InventoryErrorDetails {
  original?: unknown;
  statusCode?: number;
  retriable?: boolean;
  suggestion?: string;
  description?: string;
  [key: string]: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Reads the error fields the SDK and Node attach, without trusting their presence.
 */
export function toAwsErrorLike(err: unknown): AwsErrorLike {
  if (!isRecord(err)) {
    return { message: String(err) };
  }
  const text = (key: string): string | undefined => {
    const value = err[key];
    return typeof value === 'string' ? value : undefined;
  };
  const metadata = err.$metadata;
  const out: AwsErrorLike = {
    code: text('code'),
    Code: text('Code'),
    name: text('name'),
    message: text('message'),
    stack: text('stack'),
  };
  if (typeof err.statusCode === 'number') {
    out.statusCode = err.statusCode;
  }
  if (isRecord(metadata)) {
    out.$metadata = {
      ...metadata,
      httpStatusCode: typeof metadata.httpStatusCode === 'number' ? metadata.httpStatusCode : undefined,
      requestId: typeof metadata.requestId === 'string' ? metadata.requestId : undefined,
    };
  }
  return out;
}

export class InventoryError extends BaseError {
  constructor(message: string, details: InventoryErrorDetails = {}) {
    const { original, ...rest } = details;
    const awsErr = original === undefined ? undefined : toAwsErrorLike(original);
    const code = awsErr?.code ?? awsErr?.Code ?? awsErr?.name;
    const statusCode = details.statusCode ?? awsErr?.statusCode ?? awsErr?.$metadata?.httpStatusCode ?? 500;
    const requestId = awsErr?.$metadata?.requestId;
    const awsMessage = awsErr?.message;

    super({
      ...rest,
      message,
      code,
      statusCode,
      requestId,
      awsMessage,
      original,
      description: details.description,
    });
  }
}

export class ConfigError extends InventoryError {
  constructor(message: string, details: InventoryErrorDetails = {}) {
    super(message, {
      statusCode: 400,
      retriable: false,
      suggestion: 'Review the INVENTORY_* environment variables and CLI flags, then rerun.',
      ...details,
    });
    this.code = 'ConfigError';
  }
}

export class ModelLoadError extends InventoryError {
  namespace: string;

  constructor(message: string, details: InventoryErrorDetails & { namespace: string }) {
    super(message, {
      retriable: false,
      suggestion: 'Check that the models directory holds a Smithy JSON AST file for this namespace.',
      ...details,
    });
    this.namespace = details.namespace;
    this.code = 'ModelLoadError';
  }
}

export class OperationNotFoundError extends InventoryError {
  namespace: string;
  operation: string;

  constructor(details: InventoryErrorDetails & { namespace: string; operation: string }) {
    const { namespace, operation } = details;
    super(`Operation ${operation} is not exposed by the ${namespace} client`, {
      statusCode: 404,
      retriable: false,
      description: 'The installed client does not ship a command for this operation.',
      ...details,
    });
    this.namespace = namespace;
    this.operation = operation;
    this.code = 'OperationNotFound';
  }
}

export class ClientUnavailableError extends InventoryError {
  namespace: string;

  constructor(details: InventoryErrorDetails & { namespace: string }) {
    super(`No client package is installed for namespace "${details.namespace}"`, {
      statusCode: 404,
      retriable: false,
      suggestion: `Install @aws-sdk/client-${details.namespace} to inventory this namespace.`,
      ...details,
    });
    this.namespace = details.namespace;
    this.code = 'EndpointNotAvailable';
  }
}

export class OperationTimeoutError extends InventoryError {
  operation: string;
  timeoutMs: number;
  elapsedMs: number;

  constructor(details: InventoryErrorDetails & { operation: string; timeoutMs: number; elapsedMs: number }) {
    super(`Operation ${details.operation} exceeded its ${details.timeoutMs}ms budget (${details.elapsedMs}ms elapsed)`, {
      statusCode: 504,
      retriable: false,
      ...details,
    });
    this.operation = details.operation;
    this.timeoutMs = details.timeoutMs;
    this.elapsedMs = details.elapsedMs;
    this.code = 'OperationTimeout';
  }
}

export class CredentialsError extends InventoryError {
  constructor(message: string, details: InventoryErrorDetails = {}) {
    super(message, {
      statusCode: 401,
      retriable: false,
      suggestion: 'Configure credentials via AWS_PROFILE, static keys, or the default provider chain.',
      ...details,
    });
    this.code = 'CredentialsError';
  }
}

export class StorageError extends InventoryError {
  path?: string;

  constructor(message: string, details: InventoryErrorDetails & { path?: string } = {}) {
    super(message, {
      retriable: false,
      ...details,
    });
    this.path = details.path;
    this.code = 'StorageError';
  }
}
