import { describe, it, expect, vi } from 'vitest';

import { buildDescriptor } from '../../../src/catalog/operation-catalog-builder.class.js';
import { OperationExecutor, type ExecutorSettings } from '../../../src/execution/operation-executor.class.js';
import { FakeClientProvider, awsError, type FakeEndpoint } from '../../mocks/fake-client-provider.js';
import { operation } from '../../mocks/in-memory-model-loader.js';

const NOW = Date.parse('2026-01-01T00:00:00.000Z');

const SETTINGS: ExecutorSettings = {
  maxPages: 10,
  maxFollowups: 5,
  maxRetries: 2,
  retryBaseDelayMs: 1,
  operationTimeoutMs: 60_000,
  attemptMultiParamOperations: true,
};

const listQueues = buildDescriptor(operation('ListQueues', { optional: ['NextToken'], output: ['QueueUrls', 'NextToken'] }));
const listBuckets = buildDescriptor(operation('ListBuckets', { output: ['Buckets', 'Owner'] }));
const getBucketTagging = buildDescriptor(operation('GetBucketTagging', { required: ['BucketName'], output: ['TagSet'] }));
const getObjectAcl = buildDescriptor(operation('GetObjectAcl', { required: ['Bucket', 'Key'], output: ['Grants'] }));

function createExecutor(endpoints: Record<string, FakeEndpoint>, settings: Partial<ExecutorSettings> = {}, singlePage: string[] = []) {
  const provider = new FakeClientProvider({ endpoints });
  const executor = new OperationExecutor({
    clientProvider: provider,
    settings: { ...SETTINGS, ...settings },
    singlePageOperations: new Set(singlePage),
    sleep: vi.fn(async () => {}),
    now: () => NOW,
  });
  return { provider, executor };
}

describe('OperationExecutor', () => {
  describe('operations without required parameters', () => {
    it('follows the continuation token through the paginator', async () => {
      const { provider, executor } = createExecutor({
        sqs: {
          operations: { ListQueues: { QueueUrls: ['u1'], NextToken: 't1' } },
          paginators: { ListQueues: [{ QueueUrls: ['u2'] }] },
        },
      });

      const envelope = await executor.execute('sqs', 'us-east-1', 'ListQueues', listQueues);

      expect(envelope).toEqual({
        namespace: 'sqs',
        region: 'us-east-1',
        operation: 'ListQueues',
        timestamp: '2026-01-01T00:00:00.000Z',
        success: true,
        paginated: true,
        notAvailable: false,
        payload: { pageCount: 2, pages: [{ QueueUrls: ['u1'], NextToken: 't1' }, { QueueUrls: ['u2'] }] },
      });
      expect(provider.calls[1]?.input).toEqual({ startingToken: 't1' });
      expect(executor.cache.get('ListQueues')).toEqual(['u1', 'u2']);
    });

    it('reads one page of single-page operations', async () => {
      const { provider, executor } = createExecutor(
        {
          sqs: {
            operations: { ListQueues: { QueueUrls: ['u1'], NextToken: 't1' } },
            paginators: { ListQueues: [{ QueueUrls: ['u2'] }] },
          },
        },
        {},
        ['ListQueues']
      );

      const envelope = await executor.execute('sqs', 'us-east-1', 'ListQueues', listQueues);

      expect(envelope?.payload).toEqual({ pageCount: 1, pages: [{ QueueUrls: ['u1'], NextToken: 't1' }] });
      expect(provider.operationsCalled('sqs', 'us-east-1')).toEqual(['ListQueues']);
    });

    it('stops at maxPages', async () => {
      const { executor } = createExecutor(
        {
          sqs: {
            operations: { ListQueues: { QueueUrls: ['u1'], NextToken: 't1' } },
            paginators: { ListQueues: [{ QueueUrls: ['u2'], NextToken: 't2' }, { QueueUrls: ['u3'] }] },
          },
        },
        { maxPages: 2 }
      );

      const envelope = await executor.execute('sqs', 'us-east-1', 'ListQueues', listQueues);

      expect(envelope?.payload).toEqual({
        pageCount: 2,
        pages: [{ QueueUrls: ['u1'], NextToken: 't1' }, { QueueUrls: ['u2'], NextToken: 't2' }],
      });
    });

    it('keeps the pages read before pagination fails', async () => {
      const { executor } = createExecutor({
        sqs: {
          operations: { ListQueues: { QueueUrls: ['u1'], NextToken: 't1' } },
          paginators: {
            ListQueues: async function* () {
              yield { QueueUrls: ['u2'], NextToken: 't2' };
              throw awsError('InternalError', 'page 3 failed');
            },
          },
        },
      });

      const envelope = await executor.execute('sqs', 'us-east-1', 'ListQueues', listQueues);

      expect(envelope?.success).toBe(true);
      expect(envelope?.payload).toEqual({
        pageCount: 2,
        pages: [{ QueueUrls: ['u1'], NextToken: 't1' }, { QueueUrls: ['u2'], NextToken: 't2' }],
      });
    });

    it('retries throttled calls before succeeding', async () => {
      let attempts = 0;
      const { executor } = createExecutor({
        s3: {
          operations: {
            ListBuckets: async () => {
              attempts++;
              if (attempts < 3) throw awsError('SlowDown');
              return { Buckets: [{ Name: 'b1' }] };
            },
          },
        },
      });

      const envelope = await executor.execute('s3', 'us-east-1', 'ListBuckets', listBuckets);

      expect(attempts).toBe(3);
      expect(envelope?.success).toBe(true);
      expect(envelope?.payload).toEqual({ Buckets: [{ Name: 'b1' }] });
    });

    it('records permission errors as failures that are still available', async () => {
      const { executor } = createExecutor({
        s3: {
          operations: {
            ListBuckets: async () => {
              throw awsError('AccessDenied', 'Access Denied', 403);
            },
          },
        },
      });

      const envelope = await executor.execute('s3', 'us-east-1', 'ListBuckets', listBuckets);

      expect(envelope).toMatchObject({
        success: false,
        notAvailable: false,
        paginated: false,
        error: { code: 'AccessDenied', message: 'Access Denied', kind: 'permission' },
      });
      expect(envelope?.payload).toBeUndefined();
    });
  });

  describe('parameter inference', () => {
    const s3: FakeEndpoint = {
      operations: {
        ListBuckets: { Buckets: [{ Name: 'b1' }, { Name: 'b2' }, { Name: 'b3' }] },
        GetBucketTagging: (input) => ({ TagSet: [{ Key: 'bucket', Value: String(input.BucketName) }] }),
      },
    };

    it('issues at most maxFollowups calls from cached list results', async () => {
      const { provider, executor } = createExecutor({ s3 }, { maxFollowups: 2 });

      await executor.execute('s3', 'us-east-1', 'ListBuckets', listBuckets);
      const envelope = await executor.execute('s3', 'us-east-1', 'GetBucketTagging', getBucketTagging);

      expect(provider.calls.filter((call) => call.operation === 'GetBucketTagging').map((call) => call.input)).toEqual([
        { BucketName: 'b1' },
        { BucketName: 'b2' },
      ]);
      expect(envelope).toMatchObject({
        success: true,
        paginated: false,
        inferredParams: { BucketName: ['b1', 'b2'] },
        payload: {
          pageCount: 2,
          pages: [{ TagSet: [{ Key: 'bucket', Value: 'b1' }] }, { TagSet: [{ Key: 'bucket', Value: 'b2' }] }],
        },
      });
    });

    it('skips the operation when nothing can be inferred', async () => {
      const { provider, executor } = createExecutor({ s3 });

      const envelope = await executor.execute('s3', 'us-east-1', 'GetBucketTagging', getBucketTagging);

      expect(envelope).toBeNull();
      expect(provider.calls).toHaveLength(0);
    });

    it('reports the last error when every follow-up fails', async () => {
      const { executor } = createExecutor({
        s3: {
          operations: {
            ListBuckets: { Buckets: [{ Name: 'b1' }, { Name: 'b2' }] },
            GetBucketTagging: async (input) => {
              throw awsError('NoSuchTagSet', `no tags on ${String(input.BucketName)}`);
            },
          },
        },
      });

      await executor.execute('s3', 'us-east-1', 'ListBuckets', listBuckets);
      const envelope = await executor.execute('s3', 'us-east-1', 'GetBucketTagging', getBucketTagging);

      expect(envelope).toMatchObject({
        success: false,
        notAvailable: false,
        inferredParams: { BucketName: ['b1', 'b2'] },
        error: { code: 'NoSuchTagSet', message: 'no tags on b2' },
      });
    });
  });

  describe('operations with several required parameters', () => {
    it('records a call the API accepts without parameters', async () => {
      const { executor } = createExecutor({ s3: { operations: { GetObjectAcl: { Grants: [] } } } });

      const envelope = await executor.execute('s3', 'us-east-1', 'GetObjectAcl', getObjectAcl);

      expect(envelope).toMatchObject({
        success: true,
        payload: { Grants: [] },
        note: 'Executed without required params (API accepted)',
      });
    });

    it('skips the operation when the API rejects the bare call', async () => {
      const { executor } = createExecutor({
        s3: {
          operations: {
            GetObjectAcl: async () => {
              throw awsError('ValidationException', 'Key is required');
            },
          },
        },
      });

      expect(await executor.execute('s3', 'us-east-1', 'GetObjectAcl', getObjectAcl)).toBeNull();
    });

    it('does not call at all when the attempt is disabled', async () => {
      const { provider, executor } = createExecutor(
        { s3: { operations: { GetObjectAcl: { Grants: [] } } } },
        { attemptMultiParamOperations: false }
      );

      expect(await executor.execute('s3', 'us-east-1', 'GetObjectAcl', getObjectAcl)).toBeNull();
      expect(provider.calls).toHaveLength(0);
    });
  });

  describe('availability', () => {
    it('returns null for operations the client does not expose', async () => {
      const { executor } = createExecutor({ s3: { operations: {} } });

      expect(await executor.execute('s3', 'us-east-1', 'ListBuckets', listBuckets)).toBeNull();
    });

    it('marks namespaces without a client as not available', async () => {
      const { executor } = createExecutor({});

      const envelope = await executor.execute('braket', 'us-east-1', 'ListBuckets', listBuckets);

      expect(envelope).toMatchObject({
        success: false,
        notAvailable: true,
        error: { code: 'EndpointNotAvailable', kind: 'operation-absent' },
      });
    });

    it('marks unreachable endpoints as not available', async () => {
      const { executor } = createExecutor({
        sqs: {
          operations: {
            ListQueues: async () => {
              throw Object.assign(new Error('getaddrinfo ENOTFOUND sqs.example'), { code: 'ENOTFOUND' });
            },
          },
        },
      });

      const envelope = await executor.execute('sqs', 'ap-south-2', 'ListQueues', listQueues);

      expect(envelope).toMatchObject({
        success: false,
        notAvailable: true,
        error: { code: 'EndpointNotAvailable', kind: 'connectivity' },
      });
    });
  });

  it('reuses one client per namespace and region, and destroys them', async () => {
    const { provider, executor } = createExecutor({ s3: { operations: { ListBuckets: { Buckets: [] } } } });

    await executor.execute('s3', 'us-east-1', 'ListBuckets', listBuckets);
    await executor.execute('s3', 'us-east-1', 'ListBuckets', listBuckets);
    await executor.destroy();

    expect(provider.clients).toHaveLength(1);
    expect(provider.clients[0]?.destroyed).toBe(true);
  });
});
