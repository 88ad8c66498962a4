import { describe, it, expect } from 'vitest';

import {
  BaseError,
  ConfigError,
  CredentialsError,
  InventoryError,
  StorageError,
  toAwsErrorLike,
} from '../../src/errors.js';
import { tryFn, tryFnSync } from '../../src/concerns/try-fn.js';
import { awsError } from '../mocks/fake-client-provider.js';

describe('Inventory errors', () => {
  it('derives code, status and request id from the original SDK error', () => {
    const original = Object.assign(awsError('AccessDenied', 'denied', 403), {
      $metadata: { httpStatusCode: 403, requestId: 'req-1' },
    });
    const error = new InventoryError('Listing failed', { original });

    expect(error).toBeInstanceOf(BaseError);
    expect(error.code).toBe('AccessDenied');
    expect(error.statusCode).toBe(403);
    expect(error.requestId).toBe('req-1');
    expect(error.awsMessage).toBe('denied');
    expect(error.name).toBe('InventoryError');
  });

  it('fixes the code on subclasses and keeps suggestions', () => {
    const config = new ConfigError('bad value', { problems: ['concurrency'] });
    const credentials = new CredentialsError('no identity');
    const storage = new StorageError('disk full', { path: '/tmp/run' });

    expect(config.code).toBe('ConfigError');
    expect(config.statusCode).toBe(400);
    expect(config.data.problems).toEqual(['concurrency']);
    expect(credentials.code).toBe('CredentialsError');
    expect(credentials.suggestion).toContain('AWS_PROFILE');
    expect(storage.path).toBe('/tmp/run');
    expect(storage.toString()).toBe('StorageError | disk full');
  });

  it('serializes to JSON with its context', () => {
    const json = new ConfigError('bad value').toJSON();

    expect(json).toEqual({
      name: 'ConfigError',
      message: 'bad value',
      code: 'ConfigError',
      statusCode: 400,
      requestId: undefined,
      awsMessage: undefined,
      retriable: false,
      suggestion: 'Review the INVENTORY_* environment variables and CLI flags, then rerun.',
      description: undefined,
      data: {},
      original: undefined,
      stack: expect.any(String),
    });
  });

  it('keeps extra context in data and leaves the message untouched', () => {
    const error = new StorageError('disk full', { path: '/tmp/run', operation: 'ListQueues' });

    expect(error.message).toBe('disk full');
    expect(error.data).toEqual({ path: '/tmp/run', operation: 'ListQueues' });
  });

  it('reads error-like values defensively', () => {
    expect(toAwsErrorLike(42)).toEqual({ message: '42' });
    expect(toAwsErrorLike({ Code: 'NoSuchBucket', statusCode: 404 })).toMatchObject({ Code: 'NoSuchBucket', statusCode: 404 });
  });
});

describe('tryFn', () => {
  it('returns the value on success', async () => {
    const [ok, err, data] = await tryFn(async () => 7);

    expect(ok).toBe(true);
    expect(err).toBeNull();
    expect(data).toBe(7);
  });

  it('wraps non-Error rejections', async () => {
    const [ok, err] = await tryFn(Promise.reject('nope'));

    expect(ok).toBe(false);
    expect(err).toBeInstanceOf(Error);
    expect(err?.message).toBe('nope');
  });

  it('has a synchronous form', () => {
    const [ok, err] = tryFnSync(() => {
      throw new Error('sync');
    });

    expect(ok).toBe(false);
    expect(err?.message).toBe('sync');
  });
});
