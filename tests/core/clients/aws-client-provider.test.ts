import { describe, it, expect, vi } from 'vitest';

import {
  AwsClientProvider,
  findClientConstructor,
  toOperationOutput,
} from '../../../src/clients/aws-client-provider.class.js';
import { ClientUnavailableError, OperationNotFoundError } from '../../../src/errors.js';

class ListQueuesCommand {
  readonly input: Record<string, unknown>;

  constructor(input: Record<string, unknown>) {
    this.input = input;
  }
}

function createSqsModule() {
  const sent: unknown[] = [];
  const configs: Array<Record<string, unknown>> = [];
  let destroyed = 0;

  class SQSClient {
    constructor(config: Record<string, unknown>) {
      configs.push(config);
    }

    async send(command: unknown): Promise<unknown> {
      sent.push(command);
      return { $metadata: { httpStatusCode: 200 }, QueueUrls: ['u1'] };
    }

    destroy(): void {
      destroyed++;
    }
  }

  async function* paginateListQueues(
    config: { startingToken?: string },
    input: Record<string, unknown>
  ): AsyncGenerator<unknown> {
    yield { $metadata: {}, QueueUrls: [`from-${config.startingToken ?? 'start'}`], input };
  }

  return {
    sent,
    configs,
    destroyedCount: () => destroyed,
    module: { SQSClient, ListQueuesCommand, paginateListQueues, ServiceException: class {} },
  };
}

function createProvider(importModule: (specifier: string) => Promise<unknown>) {
  return new AwsClientProvider({
    credentials: { accessKeyId: 'test-key', secretAccessKey: 'test-secret' },
    connectTimeoutMs: 1_000,
    readTimeoutMs: 2_000,
    clientMaxAttempts: 3,
    globalRegion: 'us-east-1',
    importModule,
  });
}

describe('findClientConstructor()', () => {
  class Route53Client {
    send(): void {}
  }
  class CognitoIdentityProviderClient {
    send(): void {}
  }
  class NotAClient {}

  it('matches the namespace to the client class name', () => {
    expect(findClientConstructor('route53', { NotAClient, Route53Client })).toBe(Route53Client);
  });

  it('falls back to the first client class', () => {
    expect(findClientConstructor('cognito-idp', { CognitoIdentityProviderClient })).toBe(CognitoIdentityProviderClient);
  });

  it('returns null when no export looks like a client', () => {
    expect(findClientConstructor('sqs', { NotAClient, VERSION: '1.0.0' })).toBeNull();
  });
});

describe('toOperationOutput()', () => {
  it('drops the response metadata', () => {
    expect(toOperationOutput({ $metadata: { requestId: 'r' }, Buckets: [] })).toEqual({ Buckets: [] });
    expect(toOperationOutput(undefined)).toEqual({});
  });
});

describe('AwsClientProvider', () => {
  it('loads the client package once and configures clients per region', async () => {
    const sqs = createSqsModule();
    const importModule = vi.fn(async () => sqs.module);
    const provider = createProvider(importModule);

    await provider.createClient('sqs', 'eu-west-1');
    await provider.createClient('sqs', 'us-east-1');

    expect(importModule).toHaveBeenCalledTimes(1);
    expect(importModule).toHaveBeenCalledWith('@aws-sdk/client-sqs');
    expect(sqs.configs.map((config) => [config.region, config.maxAttempts])).toEqual([
      ['eu-west-1', 3],
      ['us-east-1', 3],
    ]);
  });

  it('sends commands and strips the response metadata', async () => {
    const sqs = createSqsModule();
    const client = await createProvider(async () => sqs.module).createClient('sqs', 'us-east-1');

    expect(client.hasOperation('ListQueues')).toBe(true);
    expect(client.hasOperation('PurgeQueue')).toBe(false);
    expect(await client.call('ListQueues', { MaxResults: 10 })).toEqual({ QueueUrls: ['u1'] });
    expect(sqs.sent).toEqual([new ListQueuesCommand({ MaxResults: 10 })]);
    await expect(client.call('PurgeQueue', {})).rejects.toBeInstanceOf(OperationNotFoundError);

    client.destroy();
    expect(sqs.destroyedCount()).toBe(1);
  });

  it('exposes the package paginator from a starting token', async () => {
    const sqs = createSqsModule();
    const client = await createProvider(async () => sqs.module).createClient('sqs', 'us-east-1');

    const paginator = client.getPaginator('ListQueues');
    const pages: unknown[] = [];
    if (paginator) {
      for await (const page of paginator({ QueueNamePrefix: 'app' }, { startingToken: 't1' })) pages.push(page);
    }

    expect(pages).toEqual([{ QueueUrls: ['from-t1'], input: { QueueNamePrefix: 'app' } }]);
    expect(client.getPaginator('GetQueueUrl')).toBeNull();
  });

  it('reports a namespace without an installed package as unavailable', async () => {
    const provider = createProvider(async (specifier) => {
      throw new Error(`Cannot find package '${specifier}'`);
    });

    const error = await provider.createClient('braket', 'us-east-1').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ClientUnavailableError);
    expect(error).toMatchObject({ code: 'EndpointNotAvailable', namespace: 'braket' });
  });

  it('reports a package without a client class as unavailable', async () => {
    const provider = createProvider(async () => ({ VERSION: '1.0.0' }));

    await expect(provider.createClient('sqs', 'us-east-1')).rejects.toBeInstanceOf(ClientUnavailableError);
  });
});
