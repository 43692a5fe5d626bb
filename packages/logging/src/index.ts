export {
  getLogContext,
  LogContextSchema,
  runWithLogContext,
  type LogContext
} from './context';
export {
  createNoopLogger,
  createStderrOnlyWriter,
  createStructuredLogger,
  LogEventInputSchema,
  LogLevelSchema,
  type LogEventInput,
  type LogLevel,
  type StructuredLogger,
  type StructuredLoggerOptions,
  type StructuredLogWriter
} from './logger';
export {sanitizeForLog} from './redaction';
