import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { configFromEnv, DEFAULT_CONFIG, loadConfig } from '../../../src/config/inventory-config.js';
import { ConfigError } from '../../../src/errors.js';

describe('Inventory configuration', () => {
  describe('loadConfig()', () => {
    it('returns the defaults for an empty environment', () => {
      const config = loadConfig({}, { env: {} });

      expect(config).toEqual(DEFAULT_CONFIG);
      expect(config.concurrency).toBe(20);
      expect(config.operationBudget).toBe(150);
      expect(config.globalRegion).toBe('us-east-1');
    });

    it('layers environment below explicit overrides', () => {
      const config = loadConfig(
        { concurrency: 4, regions: ['eu-west-1'] },
        {
          env: {
            INVENTORY_CONCURRENCY: '8',
            INVENTORY_MAX_PAGES: '3',
            INVENTORY_REGIONS: 'us-east-1, us-west-2',
            INVENTORY_DENY: 'iam,s3',
          },
        }
      );

      expect(config.concurrency).toBe(4);
      expect(config.maxPages).toBe(3);
      expect(config.regions).toEqual(['eu-west-1']);
      expect(config.deny).toEqual(['iam', 's3']);
    });

    it('ignores overrides left undefined', () => {
      const config = loadConfig({ maxFollowups: undefined }, { env: { INVENTORY_MAX_FOLLOWUPS: '2' } });

      expect(config.maxFollowups).toBe(2);
    });

    it('merges budget overrides from both sources', () => {
      const config = loadConfig(
        { operationBudgetOverrides: { iam: 50 } },
        { env: { INVENTORY_OPERATION_BUDGET_OVERRIDES: 'ec2=400,iam=200' } }
      );

      expect(config.operationBudgetOverrides).toEqual({ ec2: 400, iam: 50 });
    });

    it('returns lists the caller can change without touching the defaults', () => {
      const config = loadConfig({}, { env: {} });

      config.regions.push('eu-west-1');
      config.allow.push('sqs');
      config.deny.push('iam');

      expect(DEFAULT_CONFIG.regions).toEqual(['us-east-1']);
      expect(DEFAULT_CONFIG.allow).toEqual([]);
      expect(DEFAULT_CONFIG.deny).toEqual([]);
      expect(loadConfig({}, { env: {} }).regions).toEqual(['us-east-1']);
    });

    it('rejects values outside their range', () => {
      expect(() => loadConfig({ concurrency: 0 }, { env: {} })).toThrow(ConfigError);
      expect(() => loadConfig({ regions: [] }, { env: {} })).toThrow(ConfigError);
    });

    it('rejects a malformed role ARN', () => {
      expect(() => loadConfig({ credentials: { roleArn: 'not-an-arn' } }, { env: {} })).toThrow(ConfigError);
      expect(
        loadConfig({ credentials: { roleArn: 'arn:aws:iam::123456789012:role/Auditor' } }, { env: {} }).credentials.roleArn
      ).toBe('arn:aws:iam::123456789012:role/Auditor');
    });
  });

  describe('configFromEnv()', () => {
    it('reads credentials and the assumed role', () => {
      const overrides = configFromEnv({
        AWS_ACCESS_KEY_ID: 'test-key',
        AWS_SECRET_ACCESS_KEY: 'test-secret',
        INVENTORY_ROLE_ARN: 'arn:aws:iam::123456789012:role/Auditor',
        INVENTORY_EXTERNAL_ID: 'test-external-id',
      });

      expect(overrides.credentials).toEqual({
        accessKeyId: 'test-key',
        secretAccessKey: 'test-secret',
        roleArn: 'arn:aws:iam::123456789012:role/Auditor',
        externalId: 'test-external-id',
      });
    });

    it('prefers INVENTORY_AWS_PROFILE over AWS_PROFILE', () => {
      const overrides = configFromEnv({ AWS_PROFILE: 'default', INVENTORY_AWS_PROFILE: 'audit' });

      expect(overrides.credentials?.profile).toBe('audit');
    });

    it('leaves credentials out when none are set', () => {
      expect(configFromEnv({}).credentials).toBeUndefined();
    });

    it('parses booleans', () => {
      expect(configFromEnv({ INVENTORY_ATTEMPT_MULTI_PARAM: 'off' }).attemptMultiParamOperations).toBe(false);
      expect(configFromEnv({ INVENTORY_ATTEMPT_MULTI_PARAM: 'Yes' }).attemptMultiParamOperations).toBe(true);
    });

    it('throws on non-numeric and non-boolean values', () => {
      expect(() => configFromEnv({ INVENTORY_CONCURRENCY: 'many' })).toThrow('INVENTORY_CONCURRENCY must be numeric');
      expect(() => configFromEnv({ INVENTORY_ATTEMPT_MULTI_PARAM: 'maybe' })).toThrow(ConfigError);
      expect(() => configFromEnv({ INVENTORY_OPERATION_BUDGET_OVERRIDES: 'ec2' })).toThrow(ConfigError);
    });
  });

  describe('.env files', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(path.join(tmpdir(), 'inventory-config-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('reads the file below the process environment', async () => {
      const envFile = path.join(dir, '.env');
      await writeFile(envFile, 'INVENTORY_MAX_PAGES=7\nINVENTORY_MAX_RETRIES=4\n');

      const config = loadConfig({}, { env: { INVENTORY_MAX_RETRIES: '1' }, dotenv: envFile });

      expect(config.maxPages).toBe(7);
      expect(config.maxRetries).toBe(1);
    });
  });
});
