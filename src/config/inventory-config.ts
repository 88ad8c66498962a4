import Validator from 'fastest-validator';
import { config as loadDotenv } from 'dotenv';
import { ConfigError } from '../errors.js';

export interface AwsCredentials {
  accessKeyId?: string;
  secretAccessKey?: string;
  sessionToken?: string;
  profile?: string;
  processProfile?: string;
  /** Role assumed on top of the credentials above. */
  roleArn?: string;
  externalId?: string;
  roleSessionName?: string;
}

export interface InventoryConfig {
  /** Worker-pool width: (namespace, region) tasks in flight at once. */
  concurrency: number;
  maxPages: number;
  maxFollowups: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  taskTimeBudgetMs: number;
  /** Default per-namespace operation budget. */
  operationBudget: number;
  operationBudgetOverrides: Record<string, number>;
  connectTimeoutMs: number;
  readTimeoutMs: number;
  operationTimeoutMs: number;
  /** Attempts baked into each SDK client, on top of the executor's own retries. */
  clientMaxAttempts: number;
  globalRegion: string;
  attemptMultiParamOperations: boolean;
  regions: string[];
  allow: string[];
  deny: string[];
  modelsDir: string;
  outputDir: string;
  credentials: AwsCredentials;
}

export type InventoryConfigOverrides = Partial<Omit<InventoryConfig, 'credentials'>> & {
  credentials?: AwsCredentials;
};

export const DEFAULT_CONFIG: Readonly<InventoryConfig> = Object.freeze({
  concurrency: 20,
  maxPages: 100,
  maxFollowups: 5,
  maxRetries: 2,
  retryBaseDelayMs: 1000,
  taskTimeBudgetMs: 300_000,
  operationBudget: 150,
  operationBudgetOverrides: {},
  connectTimeoutMs: 10_000,
  readTimeoutMs: 30_000,
  operationTimeoutMs: 120_000,
  clientMaxAttempts: 2,
  globalRegion: 'us-east-1',
  attemptMultiParamOperations: true,
  regions: ['us-east-1'],
  allow: [],
  deny: [],
  modelsDir: 'models',
  outputDir: 'runs',
  credentials: {},
});

const CONFIG_SCHEMA = {
  $$root: true,
  type: 'object',
  props: {
    concurrency: { type: 'number', integer: true, min: 1, max: 256 },
    maxPages: { type: 'number', integer: true, min: 1 },
    maxFollowups: { type: 'number', integer: true, min: 0 },
    maxRetries: { type: 'number', integer: true, min: 0, max: 10 },
    retryBaseDelayMs: { type: 'number', min: 0 },
    taskTimeBudgetMs: { type: 'number', positive: true },
    operationBudget: { type: 'number', integer: true, min: 1 },
    operationBudgetOverrides: { type: 'record', key: { type: 'string' }, value: { type: 'number', integer: true, min: 1 } },
    connectTimeoutMs: { type: 'number', positive: true },
    readTimeoutMs: { type: 'number', positive: true },
    operationTimeoutMs: { type: 'number', positive: true },
    clientMaxAttempts: { type: 'number', integer: true, min: 1 },
    globalRegion: { type: 'string', empty: false },
    attemptMultiParamOperations: { type: 'boolean' },
    regions: { type: 'array', items: 'string', min: 1 },
    allow: { type: 'array', items: 'string' },
    deny: { type: 'array', items: 'string' },
    modelsDir: { type: 'string', empty: false },
    outputDir: { type: 'string', empty: false },
    credentials: {
      type: 'object',
      props: {
        accessKeyId: { type: 'string', optional: true },
        secretAccessKey: { type: 'string', optional: true },
        sessionToken: { type: 'string', optional: true },
        profile: { type: 'string', optional: true },
        processProfile: { type: 'string', optional: true },
        roleArn: { type: 'string', optional: true, pattern: /^arn:aws[a-z-]*:iam::\d{12}:role\// },
        externalId: { type: 'string', optional: true },
        roleSessionName: { type: 'string', optional: true, pattern: /^[\w+=,.@-]{2,64}$/ },
      },
    },
  },
};

const validator = new Validator();
const checkConfig = validator.compile(CONFIG_SCHEMA);

function splitList(value: string | undefined): string[] | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return value.split(',').map((part) => part.trim()).filter(Boolean);
}

function parseNumber(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(`${name} must be numeric, received "${value}"`, { variable: name });
  }
  return parsed;
}

function parseBoolean(name: string, value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const lower = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(lower)) return true;
  if (['0', 'false', 'no', 'off'].includes(lower)) return false;
  throw new ConfigError(`${name} must be a boolean, received "${value}"`, { variable: name });
}

/**
 * Budget overrides as `ns=count` pairs: `ec2=400,iam=200`.
 */
function parseBudgetOverrides(value: string | undefined): Record<string, number> | undefined {
  const entries = splitList(value);
  if (!entries) return undefined;
  const out: Record<string, number> = {};
  for (const entry of entries) {
    const [namespace, count] = entry.split('=');
    const parsed = parseNumber('INVENTORY_OPERATION_BUDGET_OVERRIDES', count);
    if (!namespace || parsed === undefined) {
      throw new ConfigError(`Malformed budget override "${entry}", expected namespace=count`);
    }
    out[namespace.trim()] = parsed;
  }
  return out;
}

function definedOnly<T extends object>(value: T): Partial<T> {
  const out: Partial<T> = {};
  for (const key in value) {
    if (value[key] !== undefined) out[key] = value[key];
  }
  return out;
}

export function configFromEnv(env: NodeJS.ProcessEnv): InventoryConfigOverrides {
  const credentials: AwsCredentials = definedOnly({
    accessKeyId: env.AWS_ACCESS_KEY_ID,
    secretAccessKey: env.AWS_SECRET_ACCESS_KEY,
    sessionToken: env.AWS_SESSION_TOKEN,
    profile: env.INVENTORY_AWS_PROFILE ?? env.AWS_PROFILE,
    processProfile: env.INVENTORY_AWS_PROCESS_PROFILE,
    roleArn: env.INVENTORY_ROLE_ARN,
    externalId: env.INVENTORY_EXTERNAL_ID,
    roleSessionName: env.INVENTORY_ROLE_SESSION_NAME,
  });

  const overrides: InventoryConfigOverrides = definedOnly({
    concurrency: parseNumber('INVENTORY_CONCURRENCY', env.INVENTORY_CONCURRENCY),
    maxPages: parseNumber('INVENTORY_MAX_PAGES', env.INVENTORY_MAX_PAGES),
    maxFollowups: parseNumber('INVENTORY_MAX_FOLLOWUPS', env.INVENTORY_MAX_FOLLOWUPS),
    maxRetries: parseNumber('INVENTORY_MAX_RETRIES', env.INVENTORY_MAX_RETRIES),
    retryBaseDelayMs: parseNumber('INVENTORY_RETRY_BASE_DELAY_MS', env.INVENTORY_RETRY_BASE_DELAY_MS),
    taskTimeBudgetMs: parseNumber('INVENTORY_TASK_TIME_BUDGET_MS', env.INVENTORY_TASK_TIME_BUDGET_MS),
    operationBudget: parseNumber('INVENTORY_OPERATION_BUDGET', env.INVENTORY_OPERATION_BUDGET),
    operationBudgetOverrides: parseBudgetOverrides(env.INVENTORY_OPERATION_BUDGET_OVERRIDES),
    connectTimeoutMs: parseNumber('INVENTORY_CONNECT_TIMEOUT_MS', env.INVENTORY_CONNECT_TIMEOUT_MS),
    readTimeoutMs: parseNumber('INVENTORY_READ_TIMEOUT_MS', env.INVENTORY_READ_TIMEOUT_MS),
    operationTimeoutMs: parseNumber('INVENTORY_OPERATION_TIMEOUT_MS', env.INVENTORY_OPERATION_TIMEOUT_MS),
    clientMaxAttempts: parseNumber('INVENTORY_CLIENT_MAX_ATTEMPTS', env.INVENTORY_CLIENT_MAX_ATTEMPTS),
    globalRegion: env.INVENTORY_GLOBAL_REGION,
    attemptMultiParamOperations: parseBoolean('INVENTORY_ATTEMPT_MULTI_PARAM', env.INVENTORY_ATTEMPT_MULTI_PARAM),
    regions: splitList(env.INVENTORY_REGIONS),
    allow: splitList(env.INVENTORY_ALLOW),
    deny: splitList(env.INVENTORY_DENY),
    modelsDir: env.INVENTORY_MODELS_DIR,
    outputDir: env.INVENTORY_OUTPUT_DIR,
  });

  if (Object.keys(credentials).length > 0) {
    overrides.credentials = credentials;
  }
  return overrides;
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** Read a .env file into `env` first; a string names the file. */
  dotenv?: boolean | string;
}

/**
 * Defaults < environment < explicit overrides. Throws ConfigError when the
 * merged result fails validation.
 */
export function loadConfig(overrides: InventoryConfigOverrides = {}, options: LoadConfigOptions = {}): InventoryConfig {
  let env: NodeJS.ProcessEnv = options.env ?? process.env;

  if (options.dotenv) {
    const fileEnv: Record<string, string> = {};
    loadDotenv({
      quiet: true,
      processEnv: fileEnv,
      ...(typeof options.dotenv === 'string' ? { path: options.dotenv } : {}),
    });
    env = { ...fileEnv, ...env };
  }

  const fromEnv = configFromEnv(env);
  const explicit = definedOnly(overrides);

  const layered = { ...DEFAULT_CONFIG, ...fromEnv, ...explicit };
  const merged: InventoryConfig = {
    ...layered,
    regions: [...layered.regions],
    allow: [...layered.allow],
    deny: [...layered.deny],
    operationBudgetOverrides: {
      ...DEFAULT_CONFIG.operationBudgetOverrides,
      ...fromEnv.operationBudgetOverrides,
      ...explicit.operationBudgetOverrides,
    },
    credentials: {
      ...DEFAULT_CONFIG.credentials,
      ...fromEnv.credentials,
      ...explicit.credentials,
    },
  };

  const result = checkConfig(merged);
  if (result !== true) {
    const problems = Array.isArray(result)
      ? result.map((issue) => issue.message ?? `${issue.field}: ${issue.type}`)
      : ['asynchronous validation is not supported for configuration'];
    throw new ConfigError(`Invalid inventory configuration: ${problems.join('; ')}`, { problems });
  }

  return merged;
}
