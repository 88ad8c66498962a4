import { fromNodeProviderChain, fromIni, fromProcess, fromTemporaryCredentials } from '@aws-sdk/credential-providers';
import { STSClient, GetCallerIdentityCommand } from '@aws-sdk/client-sts';
import { IAMClient, ListAccountAliasesCommand } from '@aws-sdk/client-iam';
import { EC2Client, DescribeRegionsCommand } from '@aws-sdk/client-ec2';
import { NodeHttpHandler } from '@smithy/node-http-handler';

import type { AwsCredentials, InventoryConfig } from '../config/inventory-config.js';
import type { Logger } from '../concerns/logger.js';
import { getGlobalLogger } from '../concerns/logger.js';
import { tryFn } from '../concerns/try-fn.js';
import { ClientUnavailableError, CredentialsError, OperationNotFoundError } from '../errors.js';
import type {
  CallerIdentity,
  ClientProvider,
  OperationClient,
  OperationInput,
  OperationOutput,
  Paginator,
} from './types.js';

type CredentialProvider = () => Promise<{
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
}>;

interface SdkClient {
  send(command: unknown): Promise<unknown>;
  destroy(): void;
}

type SdkClientConstructor = new (config: Record<string, unknown>) => SdkClient;
type SdkCommandConstructor = new (input: OperationInput) => unknown;
type SdkPaginateFunction = (
  config: { client: SdkClient; pageSize?: number; startingToken?: string },
  input: OperationInput
) => AsyncIterable<unknown>;

type SdkModule = Record<string, unknown>;

export type AwsClientProviderOptions = Pick<
  InventoryConfig,
  'credentials' | 'connectTimeoutMs' | 'readTimeoutMs' | 'clientMaxAttempts' | 'globalRegion'
> & {
  logger?: Logger;
  /** Module loader, replaceable in tests. */
  importModule?: (specifier: string) => Promise<unknown>;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isClientConstructor(value: unknown): value is SdkClientConstructor {
  return typeof value === 'function' && isRecord(value.prototype) && typeof value.prototype.send === 'function';
}

function isCommandConstructor(value: unknown): value is SdkCommandConstructor {
  return typeof value === 'function';
}

function isPaginateFunction(value: unknown): value is SdkPaginateFunction {
  return typeof value === 'function';
}

function baseCredentialProvider(credentials: AwsCredentials): CredentialProvider {
  if (credentials.accessKeyId && credentials.secretAccessKey) {
    const staticCredentials = {
      accessKeyId: credentials.accessKeyId,
      secretAccessKey: credentials.secretAccessKey,
      sessionToken: credentials.sessionToken
    };
    return async () => staticCredentials;
  }

  if (credentials.profile) {
    return fromIni({ profile: credentials.profile });
  }

  if (credentials.processProfile) {
    return fromProcess({ profile: credentials.processProfile });
  }

  return fromNodeProviderChain();
}

/**
 * Static keys, then a named profile, then a credential_process profile,
 * then the default chain. A role ARN assumes that role on top of the result.
 */
export function buildCredentialProvider(credentials: AwsCredentials = {}): CredentialProvider {
  const base = baseCredentialProvider(credentials);
  if (!credentials.roleArn) return base;

  return fromTemporaryCredentials({
    masterCredentials: base,
    params: {
      RoleArn: credentials.roleArn,
      RoleSessionName: credentials.roleSessionName ?? 'surface-inventory',
      ...(credentials.externalId ? { ExternalId: credentials.externalId } : {}),
    },
  });
}

/**
 * Strips the SDK's response envelope, keeping only modelled output members.
 */
export function toOperationOutput(response: unknown): OperationOutput {
  if (!isRecord(response)) return {};
  const output: OperationOutput = {};
  for (const [key, value] of Object.entries(response)) {
    if (key !== '$metadata') output[key] = value;
  }
  return output;
}

export function findClientConstructor(namespace: string, mod: SdkModule): SdkClientConstructor | null {
  const wanted = `${namespace.replace(/[^a-z0-9]/gi, '').toLowerCase()}client`;
  let fallback: SdkClientConstructor | null = null;

  for (const [name, value] of Object.entries(mod)) {
    if (!name.endsWith('Client') || name.startsWith('_') || !isClientConstructor(value)) continue;
    if (name.toLowerCase() === wanted) return value;
    fallback ??= value;
  }
  return fallback;
}

class AwsOperationClient implements OperationClient {
  readonly namespace: string;
  readonly region: string;
  private readonly mod: SdkModule;
  private readonly client: SdkClient;

  constructor(namespace: string, region: string, mod: SdkModule, client: SdkClient) {
    this.namespace = namespace;
    this.region = region;
    this.mod = mod;
    this.client = client;
  }

  hasOperation(operation: string): boolean {
    return isCommandConstructor(this.mod[`${operation}Command`]);
  }

  async call(operation: string, input: OperationInput): Promise<OperationOutput> {
    const Command = this.mod[`${operation}Command`];
    if (!isCommandConstructor(Command)) {
      throw new OperationNotFoundError({ namespace: this.namespace, operation });
    }
    const response = await this.client.send(new Command(input));
    return toOperationOutput(response);
  }

  getPaginator(operation: string): Paginator | null {
    const paginate = this.mod[`paginate${operation}`];
    if (!isPaginateFunction(paginate)) return null;

    const client = this.client;
    return async function* (input, options) {
      const pages = paginate({ client, pageSize: options.pageSize, startingToken: options.startingToken }, input);
      for await (const page of pages) {
        yield toOperationOutput(page);
      }
    };
  }

  destroy(): void {
    this.client.destroy();
  }
}

/**
 * Loads `@aws-sdk/client-<namespace>` on first use and hands out clients
 * with the run's credentials, timeouts and attempt count.
 */
export class AwsClientProvider implements ClientProvider {
  private readonly options: AwsClientProviderOptions;
  private readonly credentialProvider: CredentialProvider;
  private readonly logger: Logger;
  private readonly importModule: (specifier: string) => Promise<unknown>;
  private readonly modules = new Map<string, Promise<SdkModule>>();

  constructor(options: AwsClientProviderOptions) {
    this.options = options;
    this.credentialProvider = buildCredentialProvider(options.credentials);
    this.logger = options.logger ?? getGlobalLogger();
    this.importModule = options.importModule ?? ((specifier) => import(specifier));
  }

  private clientConfig(region: string) {
    return {
      region,
      credentials: this.credentialProvider,
      maxAttempts: this.options.clientMaxAttempts,
      requestHandler: new NodeHttpHandler({
        connectionTimeout: this.options.connectTimeoutMs,
        requestTimeout: this.options.readTimeoutMs,
      }),
    };
  }

  private loadModule(namespace: string): Promise<SdkModule> {
    let pending = this.modules.get(namespace);
    if (!pending) {
      pending = this.importClientPackage(namespace);
      this.modules.set(namespace, pending);
    }
    return pending;
  }

  private async importClientPackage(namespace: string): Promise<SdkModule> {
    const specifier = `@aws-sdk/client-${namespace}`;
    const [ok, err, mod] = await tryFn(() => this.importModule(specifier));
    if (!ok || !isRecord(mod)) {
      this.logger.debug({ namespace, err }, 'client package not installed');
      throw new ClientUnavailableError({ namespace, original: err ?? undefined });
    }
    return mod;
  }

  async createClient(namespace: string, region: string): Promise<OperationClient> {
    const mod = await this.loadModule(namespace);
    const Client = findClientConstructor(namespace, mod);
    if (!Client) {
      throw new ClientUnavailableError({ namespace, description: `${namespace} exports no client class` });
    }
    return new AwsOperationClient(namespace, region, mod, new Client(this.clientConfig(region)));
  }

  async identify(): Promise<CallerIdentity> {
    const region = this.options.globalRegion;
    const sts = new STSClient(this.clientConfig(region));
    const [ok, err, caller] = await tryFn(sts.send(new GetCallerIdentityCommand({})));
    sts.destroy();
    if (!ok) {
      throw new CredentialsError('Unable to resolve AWS caller identity', { original: err });
    }

    const identity: CallerIdentity = {
      accountId: caller.Account,
      arn: caller.Arn,
      userId: caller.UserId,
    };

    const iam = new IAMClient(this.clientConfig(region));
    const [aliasOk, aliasErr, aliases] = await tryFn(iam.send(new ListAccountAliasesCommand({})));
    iam.destroy();
    if (aliasOk) {
      identity.accountAlias = aliases.AccountAliases?.[0];
    } else {
      this.logger.debug({ err: aliasErr }, 'account alias not readable');
    }

    return identity;
  }

  async listRegions(): Promise<string[]> {
    const ec2 = new EC2Client(this.clientConfig(this.options.globalRegion));
    const [ok, err, response] = await tryFn(ec2.send(new DescribeRegionsCommand({})));
    ec2.destroy();
    if (!ok) {
      throw new CredentialsError('Unable to list enabled regions', { original: err });
    }
    return (response.Regions ?? [])
      .map((region) => region.RegionName)
      .filter((name): name is string => typeof name === 'string')
      .sort();
  }
}
