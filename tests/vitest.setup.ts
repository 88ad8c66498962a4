// Vitest setup file - keeps runs quiet and deterministic
import { config } from 'dotenv';
import { afterAll } from 'vitest';

import { resetGlobalLogger } from '../src/concerns/logger.js';

config({
  quiet: true,
  debug: false,
});

process.env.NODE_ENV = 'test';
if (process.env.INVENTORY_LOG_LEVEL === undefined) {
  process.env.INVENTORY_LOG_LEVEL = 'silent';
}
process.env.INVENTORY_LOG_FORMAT = 'json';

afterAll(() => {
  resetGlobalLogger();
});
