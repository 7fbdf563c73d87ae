import { Writable } from 'node:stream';
import pino, { type Logger as PinoLogger, type LoggerOptions } from 'pino';
import { trace } from '@opentelemetry/api';
import type { Config } from '@/config';

type LogRecord = Record<string, unknown>;

const LEVEL_MAP: Record<number, string> = {
  10: 'TRACE',
  20: 'DEBUG',
  30: 'INFO',
  40: 'WARN',
  50: 'ERROR',
  60: 'FATAL',
};

const ANSI = {
  reset: '\u001b[0m',
  dim: '\u001b[2m',
  cyan: '\u001b[36m',
  blue: '\u001b[34m',
  green: '\u001b[32m',
  yellow: '\u001b[33m',
  red: '\u001b[31m',
  magenta: '\u001b[35m',
};

const STANDARD_KEYS = new Set(['level', 'time', 'msg', 'module', 'traceId', 'spanId']);

const MAX_PAYLOAD_DEPTH = 3;

let rootLogger: PinoLogger | null = null;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const toLevel = (level: unknown): string => {
  if (typeof level === 'number') {
    return LEVEL_MAP[level] ?? 'INFO';
  }
  if (typeof level === 'string' && level.length > 0) {
    return level.toUpperCase();
  }
  return 'INFO';
};

const toTimestamp = (value: unknown): string => {
  const parsed = typeof value === 'number' || typeof value === 'string' ? new Date(value) : new Date();
  const iso = Number.isNaN(parsed.getTime()) ? new Date().toISOString() : parsed.toISOString();
  return iso.slice(0, 19).replace('T', ' ');
};

const truncateValue = (value: unknown, depth: number): unknown => {
  if (depth >= MAX_PAYLOAD_DEPTH && (Array.isArray(value) || isRecord(value))) {
    return '[Truncated]';
  }

  if (Array.isArray(value)) {
    const limited = value.slice(0, 25).map((item) => truncateValue(item, depth + 1));
    return value.length > 25 ? [...limited, '[Truncated]'] : limited;
  }

  if (isRecord(value)) {
    const output: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      output[key] = truncateValue(item, depth + 1);
    }
    return output;
  }

  // presigned URLs are long and carry signatures
  if (typeof value === 'string' && value.length > 512) {
    return `${value.slice(0, 512)}...[Truncated]`;
  }

  return value;
};

const colorize = (value: string, color: string, enabled: boolean): string =>
  enabled ? `${color}${value}${ANSI.reset}` : value;

const levelColor = (level: string): string => {
  switch (level) {
    case 'TRACE':
      return ANSI.dim;
    case 'DEBUG':
      return ANSI.cyan;
    case 'INFO':
      return ANSI.green;
    case 'WARN':
      return ANSI.yellow;
    case 'ERROR':
      return ANSI.red;
    case 'FATAL':
      return ANSI.magenta;
    default:
      return ANSI.reset;
  }
};

const splitRecord = (record: LogRecord): { payload: Record<string, unknown>; stack: string | null } => {
  const payload: Record<string, unknown> = {};
  let stack: string | null = null;

  for (const [key, value] of Object.entries(record)) {
    if (STANDARD_KEYS.has(key)) {
      continue;
    }
    if (key === 'err' && isRecord(value) && typeof value.stack === 'string') {
      stack = value.stack;
      const { stack: _omitted, ...rest } = value;
      payload.err = rest;
      continue;
    }
    payload[key] = value;
  }

  return { payload, stack };
};

const indent = (text: string): string =>
  text
    .split('\n')
    .map((line) => `  ${line}`)
    .join('\n');

export const formatHumanLine = (record: LogRecord, enableColor: boolean): string => {
  const moduleName = typeof record.module === 'string' && record.module.length > 0 ? record.module : 'SynapseFs';
  const level = toLevel(record.level);
  const message = typeof record.msg === 'string' && record.msg.length > 0 ? record.msg : '(no message)';

  const header = [
    colorize(`[${moduleName}]`, ANSI.blue, enableColor),
    colorize(`[${level}]`, levelColor(level), enableColor),
    colorize(toTimestamp(record.time), ANSI.dim, enableColor),
    message,
  ].join(' ');

  const { payload, stack } = splitRecord(record);
  const truncated = truncateValue(payload, 0);
  const payloadText =
    isRecord(truncated) && Object.keys(truncated).length > 0
      ? `\n${indent(JSON.stringify(truncated, null, 2))}`
      : '';
  const stackText = stack !== null ? `\n${indent(stack)}` : '';

  return `${header}${payloadText}${stackText}`;
};

class HumanReadableStream extends Writable {
  private readonly useColor: boolean;

  constructor(options: { useColor: boolean }) {
    super();
    this.useColor = options.useColor;
  }

  override _write(chunk: string | Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    for (const line of chunk.toString().split('\n')) {
      if (line.trim().length === 0) {
        continue;
      }
      try {
        const parsed: unknown = JSON.parse(line);
        const text = isRecord(parsed) ? formatHumanLine(parsed, this.useColor) : line;
        process.stderr.write(`${text}\n`);
      } catch {
        process.stderr.write(`${line}\n`);
      }
    }
    callback();
  }
}

/**
 * Initialise the process-wide logger. Later calls return the first logger; the library
 * is usually embedded in a host that configures logging once.
 */
export const initRootLogger = (config: Config): PinoLogger => {
  if (rootLogger) {
    return rootLogger;
  }

  const loggerOptions: LoggerOptions = {
    level: config.telemetry.logLevel,
    base: undefined,
    redact: {
      paths: config.telemetry.redactPaths,
      censor: '[REDACTED]',
      remove: false,
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
    mixin() {
      const activeSpan = trace.getActiveSpan();
      if (!activeSpan) {
        return {};
      }
      const spanContext = activeSpan.spanContext();
      return {
        traceId: spanContext.traceId,
        spanId: spanContext.spanId,
      };
    },
  };

  rootLogger =
    config.telemetry.logFormat === 'pretty'
      ? pino(loggerOptions, new HumanReadableStream({ useColor: process.stderr.isTTY === true }))
      : pino(loggerOptions, pino.destination(2));
  return rootLogger;
};

export const getLogger = (moduleName: string): PinoLogger => {
  if (!rootLogger) {
    rootLogger = pino(
      {
        level: process.env.SYNAPSE_LOG_LEVEL ?? 'info',
        base: undefined,
        serializers: { err: pino.stdSerializers.err },
      },
      pino.destination(2)
    );
  }
  return rootLogger.child({ module: moduleName });
};
