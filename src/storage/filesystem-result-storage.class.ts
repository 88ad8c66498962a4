import { mkdir, writeFile, readFile, readdir, rename, unlink } from 'node:fs/promises';
import path from 'node:path';
import zlib from 'node:zlib';
import { promisify } from 'node:util';
import { nanoid } from 'nanoid';

import { tryFn } from '../concerns/try-fn.js';
import type { Logger } from '../concerns/logger.js';
import { getGlobalLogger } from '../concerns/logger.js';
import { StorageError } from '../errors.js';
import type { ResultEnvelope } from '../types/envelope.types.js';
import type { RunMetadata, RunSummary } from '../types/run.types.js';
import { fromStoredEnvelope, toStoredEnvelope, type ResultStorage } from './result-storage.js';

const gzip = promisify(zlib.gzip);
const gunzip = promisify(zlib.gunzip);

const ENVELOPE_SUFFIX = '.json.gz';
export const SUMMARY_FILE = 'collection-stats.json';
export const METADATA_FILE = 'metadata.json';

export interface FileSystemResultStorageConfig {
  runDir: string;
  compressionLevel?: number;
  logger?: Logger;
}

function errnoCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  return typeof err.code === 'string' ? err.code : undefined;
}

/**
 * `<runDir>/raw/<namespace>/<region>/<operation>.json.gz`, one gzip JSON
 * document per envelope, plus the run summary and metadata beside `raw/`.
 */
export class FileSystemResultStorage implements ResultStorage {
  readonly runDir: string;
  private readonly rawDir: string;
  private readonly compressionLevel: number;
  private readonly logger: Logger;
  private readonly pendingWrites = new Map<string, Promise<void>>();

  constructor(config: FileSystemResultStorageConfig) {
    this.runDir = path.resolve(config.runDir);
    this.rawDir = path.join(this.runDir, 'raw');
    this.compressionLevel = config.compressionLevel ?? 6;
    this.logger = config.logger ?? getGlobalLogger();
  }

  envelopePath(namespace: string, region: string, operation: string): string {
    return path.join(this.rawDir, namespace, region, `${operation}${ENVELOPE_SUFFIX}`);
  }

  async put(envelope: ResultEnvelope): Promise<void> {
    const filePath = this.envelopePath(envelope.namespace, envelope.region, envelope.operation);
    const body = await gzip(Buffer.from(JSON.stringify(toStoredEnvelope(envelope))), { level: this.compressionLevel });
    await this.serialised(filePath, () => this.writeAtomic(filePath, body));
  }

  /** Unreadable envelopes are logged and skipped. */
  async *list(): AsyncIterable<ResultEnvelope> {
    for (const namespace of await this.listDir(this.rawDir, 'directory')) {
      const namespaceDir = path.join(this.rawDir, namespace);
      for (const region of await this.listDir(namespaceDir, 'directory')) {
        const regionDir = path.join(namespaceDir, region);
        const files = (await this.listDir(regionDir, 'file')).filter((name) => name.endsWith(ENVELOPE_SUFFIX));
        for (const file of files) {
          const filePath = path.join(regionDir, file);
          const [ok, err, envelope] = await tryFn(this.readEnvelope(filePath));
          if (!ok) {
            this.logger.warn({ path: filePath, err }, 'skipping unreadable envelope');
            continue;
          }
          yield envelope;
        }
      }
    }
  }

  async writeSummary(summary: RunSummary): Promise<void> {
    const filePath = path.join(this.runDir, SUMMARY_FILE);
    await this.serialised(filePath, () => this.writeAtomic(filePath, JSON.stringify(summary, null, 2)));
  }

  async writeMetadata(metadata: RunMetadata): Promise<void> {
    const filePath = path.join(this.runDir, METADATA_FILE);
    await this.serialised(filePath, () => this.writeAtomic(filePath, JSON.stringify(metadata, null, 2)));
  }

  async readEnvelope(filePath: string): Promise<ResultEnvelope> {
    const [ok, err, compressed] = await tryFn(readFile(filePath));
    if (!ok) {
      throw new StorageError(`Unable to read ${filePath}`, { path: filePath, original: err });
    }
    const [unzipOk, unzipErr, raw] = await tryFn(gunzip(compressed));
    if (!unzipOk) {
      throw new StorageError(`Envelope ${filePath} is not valid gzip`, { path: filePath, original: unzipErr });
    }
    let document: unknown;
    try {
      document = JSON.parse(raw.toString('utf8'));
    } catch (parseErr) {
      throw new StorageError(`Envelope ${filePath} is not valid JSON`, { path: filePath, original: parseErr });
    }
    return fromStoredEnvelope(document, filePath);
  }

  /** Writes to the same path run one after another. */
  private serialised(filePath: string, write: () => Promise<void>): Promise<void> {
    const previous = this.pendingWrites.get(filePath) ?? Promise.resolve();
    const next = previous.then(write, write);
    this.pendingWrites.set(filePath, next);
    const cleanup = (): void => {
      if (this.pendingWrites.get(filePath) === next) this.pendingWrites.delete(filePath);
    };
    void next.then(cleanup, cleanup);
    return next;
  }

  private async writeAtomic(filePath: string, data: Buffer | string): Promise<void> {
    const dir = path.dirname(filePath);
    const [dirOk, dirErr] = await tryFn(() => mkdir(dir, { recursive: true }));
    if (!dirOk) {
      throw new StorageError(`Unable to create directory ${dir}`, { path: dir, original: dirErr });
    }

    const tempPath = `${filePath}.tmp.${nanoid(6)}`;
    try {
      await writeFile(tempPath, data);
      await rename(tempPath, filePath);
    } catch (error) {
      const [cleanupOk, cleanupErr] = await tryFn(unlink(tempPath));
      if (!cleanupOk && errnoCode(cleanupErr) !== 'ENOENT') {
        this.logger.debug({ path: tempPath, err: cleanupErr }, 'temporary file left behind');
      }
      throw new StorageError(`Unable to write ${filePath}`, { path: filePath, original: error });
    }
  }

  private async listDir(dir: string, kind: 'directory' | 'file'): Promise<string[]> {
    const [ok, err, entries] = await tryFn(readdir(dir, { withFileTypes: true }));
    if (!ok) {
      if (errnoCode(err) === 'ENOENT') return [];
      throw new StorageError(`Unable to list ${dir}`, { path: dir, original: err });
    }
    return entries
      .filter((entry) => (kind === 'directory' ? entry.isDirectory() : entry.isFile()))
      .map((entry) => entry.name)
      .sort();
  }
}
