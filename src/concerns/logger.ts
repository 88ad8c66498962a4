import pino, { type Logger as PinoLogger, type LoggerOptions as PinoLoggerOptions, type TransportSingleOptions } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';
export type LogFormat = 'json' | 'pretty';

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
  format?: LogFormat;
  transport?: TransportSingleOptions;
  bindings?: Record<string, unknown>;
}

export type Logger = PinoLogger;

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

let globalLogger: Logger | null = null;

function hasToJSON(value: object): value is { toJSON: () => unknown } {
  return 'toJSON' in value && typeof value.toJSON === 'function';
}

function serializeError(err: unknown): unknown {
  if (!err || typeof err !== 'object') {
    return err;
  }

  if (hasToJSON(err)) {
    return err.toJSON();
  }

  if (err instanceof Error) {
    return {
      ...err,
      name: err.name,
      message: err.message,
      stack: err.stack,
    };
  }

  return err;
}

function createPrettyTransport(): TransportSingleOptions {
  return {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss.l',
      ignore: 'pid,hostname',
      singleLine: false
    }
  };
}

function createDefaultTransport(): TransportSingleOptions | undefined {
  const envFormat = process.env.INVENTORY_LOG_FORMAT?.toLowerCase();

  if (envFormat === 'json' || process.env.NODE_ENV === 'test' || !process.stdout.isTTY) {
    return undefined;
  }

  return createPrettyTransport();
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const {
    level = 'info',
    name,
    format,
    transport,
    bindings = {},
  } = options;

  let finalTransport: TransportSingleOptions | undefined;
  if (format === 'json') {
    finalTransport = undefined;
  } else if (format === 'pretty') {
    finalTransport = createPrettyTransport();
  } else if (transport !== undefined) {
    finalTransport = transport;
  } else {
    finalTransport = createDefaultTransport();
  }

  const config: PinoLoggerOptions = {
    level,
    name,
    transport: finalTransport,
    serializers: {
      err: serializeError,
      error: serializeError
    }
  };

  const logger = pino(config);

  if (Object.keys(bindings).length > 0) {
    return logger.child(bindings);
  }

  return logger;
}

export function getGlobalLogger(options: LoggerOptions = {}): Logger {
  if (!globalLogger) {
    globalLogger = createLogger(getLoggerOptionsFromEnv(options));
  }
  return globalLogger;
}

export function resetGlobalLogger(): void {
  globalLogger = null;
}

/** Fills level and format from INVENTORY_LOG_* where the caller left them unset. */
export function getLoggerOptionsFromEnv(
  configOptions: LoggerOptions = {},
  env: NodeJS.ProcessEnv = process.env
): LoggerOptions {
  const options: LoggerOptions = { ...configOptions };

  const level = env.INVENTORY_LOG_LEVEL?.toLowerCase();
  if (options.level === undefined && isLogLevel(level)) {
    options.level = level;
  }

  const format = env.INVENTORY_LOG_FORMAT?.toLowerCase();
  if (options.format === undefined && (format === 'json' || format === 'pretty')) {
    options.format = format;
  }

  return options;
}

export default createLogger;
