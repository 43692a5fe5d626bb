import type {Writable} from 'node:stream';

import {LogEventSchema, type LogEvent} from '@signed-api-tools/schemas';
import {z} from 'zod';

import {getLogContext, type LogContext} from './context';
import {sanitizeForLog} from './redaction';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

const EmittableLogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal']);
type EmittableLogLevel = z.infer<typeof EmittableLogLevelSchema>;

export const LogEventInputSchema = z
  .object({
    level: EmittableLogLevelSchema,
    event: z.string().min(1),
    component: z.string().min(1),
    message: z.string().min(1).optional(),
    correlation_id: z.string().min(1).max(128).optional(),
    request_id: z.string().min(1).max(128).optional(),
    tool_name: z.string().min(1).optional(),
    reason_code: z.string().min(1).optional(),
    duration_ms: z.number().int().gte(0).optional(),
    status_code: z.number().int().gte(100).lte(599).optional(),
    route: z.string().min(1).optional(),
    method: z.string().min(1).optional(),
    metadata: z.record(z.string(), z.unknown()).optional()
  })
  .strict();

export type LogEventInput = z.infer<typeof LogEventInputSchema>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
  silent: 90
};

export type StructuredLogWriter = {
  stdout: Pick<Writable, 'write'>;
  stderr: Pick<Writable, 'write'>;
};

export type StructuredLoggerOptions = {
  service: string;
  env: string;
  level: LogLevel;
  now?: () => Date;
  writer?: StructuredLogWriter;
  extraSensitiveKeys?: string[];
};

type LevelMethodInput = Omit<LogEventInput, 'level'>;

export type StructuredLogger = {
  log: (input: LogEventInput) => void;
  isLevelEnabled: (level: EmittableLogLevel) => boolean;
  debug: (input: LevelMethodInput) => void;
  info: (input: LevelMethodInput) => void;
  warn: (input: LevelMethodInput) => void;
  error: (input: LevelMethodInput) => void;
  fatal: (input: LevelMethodInput) => void;
};

const defaultWriter: StructuredLogWriter = {
  stdout: process.stdout,
  stderr: process.stderr
};

/** Routes every level to stderr; used when stdout carries a protocol stream. */
export const createStderrOnlyWriter = (stderr: Pick<Writable, 'write'> = process.stderr): StructuredLogWriter => ({
  stdout: stderr,
  stderr
});

const chooseStream = ({level, writer}: {level: EmittableLogLevel; writer: StructuredLogWriter}) =>
  level === 'warn' || level === 'error' || level === 'fatal' ? writer.stderr : writer.stdout;

const resolveContext = ({context, input}: {context: LogContext | undefined; input: LogEventInput}) => ({
  correlation_id: input.correlation_id ?? context?.correlation_id ?? 'n/a',
  request_id: input.request_id ?? context?.request_id ?? 'n/a',
  tool_name: input.tool_name ?? context?.tool_name,
  route: input.route ?? context?.route,
  method: input.method ?? context?.method
});

const createEnvelope = ({
  input,
  options,
  context
}: {
  input: LogEventInput;
  options: Required<Pick<StructuredLoggerOptions, 'service' | 'env' | 'now' | 'extraSensitiveKeys'>>;
  context: LogContext | undefined;
}): LogEvent => {
  const resolvedContext = resolveContext({context, input});
  const sanitizedMetadata = sanitizeForLog({
    value: input.metadata ?? {},
    extraSensitiveKeys: options.extraSensitiveKeys
  });

  return LogEventSchema.parse({
    ts: options.now().toISOString(),
    level: input.level,
    service: options.service,
    env: options.env,
    event: input.event,
    component: input.component,
    correlation_id: resolvedContext.correlation_id,
    request_id: resolvedContext.request_id,
    ...(input.message ? {message: input.message} : {}),
    ...(resolvedContext.tool_name ? {tool_name: resolvedContext.tool_name} : {}),
    ...(input.reason_code ? {reason_code: input.reason_code} : {}),
    ...(input.duration_ms !== undefined ? {duration_ms: input.duration_ms} : {}),
    ...(input.status_code !== undefined ? {status_code: input.status_code} : {}),
    ...(resolvedContext.route ? {route: resolvedContext.route} : {}),
    ...(resolvedContext.method ? {method: resolvedContext.method} : {}),
    metadata: sanitizedMetadata
  });
};

export const createStructuredLogger = (options: StructuredLoggerOptions): StructuredLogger => {
  const configuredLevel = LogLevelSchema.parse(options.level);
  const envelopeOptions = {
    service: z.string().min(1).parse(options.service),
    env: z.string().min(1).parse(options.env),
    now: options.now ?? (() => new Date()),
    extraSensitiveKeys: options.extraSensitiveKeys ?? []
  };
  const writer = options.writer ?? defaultWriter;

  const isLevelEnabled = (level: EmittableLogLevel) => LEVEL_ORDER[level] >= LEVEL_ORDER[configuredLevel];

  const log = (rawInput: LogEventInput) => {
    try {
      const input = LogEventInputSchema.parse(rawInput);
      if (!isLevelEnabled(input.level)) {
        return;
      }

      const envelope = createEnvelope({input, options: envelopeOptions, context: getLogContext()});
      chooseStream({level: input.level, writer}).write(`${JSON.stringify(envelope)}\n`);
    } catch {
      // Logging failures must never break runtime behavior.
    }
  };

  return {
    log,
    isLevelEnabled,
    debug: input => log({...input, level: 'debug'}),
    info: input => log({...input, level: 'info'}),
    warn: input => log({...input, level: 'warn'}),
    error: input => log({...input, level: 'error'}),
    fatal: input => log({...input, level: 'fatal'})
  };
};

export const createNoopLogger = (): StructuredLogger => ({
  log: () => undefined,
  isLevelEnabled: () => false,
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  fatal: () => undefined
});
