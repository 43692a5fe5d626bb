import {AsyncLocalStorage} from 'node:async_hooks';

import {z} from 'zod';

export const LogContextSchema = z
  .object({
    correlation_id: z.string().min(1).max(128).optional(),
    request_id: z.string().min(1).max(128).optional(),
    tool_name: z.string().min(1).optional(),
    route: z.string().min(1).optional(),
    method: z.string().min(1).optional()
  })
  .strict();

export type LogContext = z.infer<typeof LogContextSchema>;

const logContextStorage = new AsyncLocalStorage<Readonly<LogContext>>();

/**
 * Runs `operation` with `context` layered over the enclosing scope's fields.
 * Inner fields win; the enclosing scope is left untouched.
 */
export const runWithLogContext = <T>(context: LogContext, operation: () => T): T => {
  const layered = {...logContextStorage.getStore(), ...LogContextSchema.parse(context)};
  return logContextStorage.run(Object.freeze(layered), operation);
};

export const getLogContext = (): Readonly<LogContext> | undefined => logContextStorage.getStore();
