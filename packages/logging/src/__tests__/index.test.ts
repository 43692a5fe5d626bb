import {describe, expect, it} from 'vitest';

import {
  createNoopLogger,
  createStderrOnlyWriter,
  createStructuredLogger,
  getLogContext,
  runWithLogContext,
  sanitizeForLog
} from '../index';

const createBufferedWriter = () => {
  const stdout: string[] = [];
  const stderr: string[] = [];

  return {
    stdout,
    stderr,
    writer: {
      stdout: {
        write: (chunk: string | Uint8Array) => {
          stdout.push(String(chunk).trim());
          return true;
        }
      },
      stderr: {
        write: (chunk: string | Uint8Array) => {
          stderr.push(String(chunk).trim());
          return true;
        }
      }
    }
  };
};

const parseLine = (line: string | undefined) => JSON.parse(line ?? '{}') as Record<string, unknown>;

describe('@signed-api-tools/logging', () => {
  it('redacts credential-shaped keys recursively', () => {
    const sanitized = sanitizeForLog({
      value: {
        authorization: 'Bearer value',
        nested: {
          api_secret: 'test-secret',
          API_KEY: 'test-key',
          allowed: 'ok'
        },
        cookie: 'session=1'
      }
    }) as Record<string, unknown>;

    expect(sanitized).toEqual({
      authorization: '[REDACTED]',
      nested: {
        api_secret: '[REDACTED]',
        API_KEY: '[REDACTED]',
        allowed: 'ok'
      },
      cookie: '[REDACTED]'
    });
  });

  it('isolates async context across concurrent calls', async () => {
    const seen: string[] = [];

    await Promise.all([
      runWithLogContext({correlation_id: 'corr_a', request_id: 'req_a'}, async () => {
        await new Promise(resolve => setTimeout(resolve, 5));
        seen.push(getLogContext()?.correlation_id ?? 'missing');
      }),
      runWithLogContext({correlation_id: 'corr_b', request_id: 'req_b'}, async () => {
        await new Promise(resolve => setTimeout(resolve, 1));
        seen.push(getLogContext()?.correlation_id ?? 'missing');
      })
    ]);

    expect(new Set(seen)).toEqual(new Set(['corr_a', 'corr_b']));
  });

  it('layers nested scopes over the enclosing context', () => {
    runWithLogContext({correlation_id: 'corr_1', route: '/mcp'}, () => {
      runWithLogContext({tool_name: 'list_devices', route: '/reporting/devices'}, () => {
        expect(getLogContext()).toEqual({
          correlation_id: 'corr_1',
          tool_name: 'list_devices',
          route: '/reporting/devices'
        });
      });

      expect(getLogContext()).toEqual({correlation_id: 'corr_1', route: '/mcp'});
    });
  });

  it('has no context outside a scope', () => {
    expect(getLogContext()).toBeUndefined();
  });

  it('emits a valid envelope carrying the async context', () => {
    const buffer = createBufferedWriter();
    const logger = createStructuredLogger({
      service: 'tool-server',
      env: 'test',
      level: 'debug',
      now: () => new Date('2025-03-01T10:00:00.000Z'),
      writer: buffer.writer
    });

    runWithLogContext({correlation_id: 'corr_2', request_id: 'req_2', tool_name: 'get_device'}, () => {
      logger.info({
        event: 'tool.call.completed',
        component: 'mcp.tools',
        status_code: 200,
        metadata: {authorization: 'Bearer test', path: '/reporting/devices'}
      });
    });

    expect(buffer.stdout).toHaveLength(1);
    expect(parseLine(buffer.stdout[0])).toEqual({
      ts: '2025-03-01T10:00:00.000Z',
      level: 'info',
      service: 'tool-server',
      env: 'test',
      event: 'tool.call.completed',
      component: 'mcp.tools',
      correlation_id: 'corr_2',
      request_id: 'req_2',
      tool_name: 'get_device',
      status_code: 200,
      metadata: {authorization: '[REDACTED]', path: '/reporting/devices'}
    });
  });

  it('filters by level and routes warnings and errors to stderr', () => {
    const buffer = createBufferedWriter();
    const logger = createStructuredLogger({
      service: 'tool-server',
      env: 'test',
      level: 'info',
      writer: buffer.writer
    });

    logger.debug({event: 'debug.event', component: 'test'});
    logger.info({event: 'info.event', component: 'test'});
    logger.warn({event: 'warn.event', component: 'test'});
    logger.error({event: 'error.event', component: 'test'});
    logger.fatal({event: 'fatal.event', component: 'test'});

    expect(buffer.stdout.map(line => parseLine(line).event)).toEqual(['info.event']);
    expect(buffer.stderr.map(line => parseLine(line).event)).toEqual(['warn.event', 'error.event', 'fatal.event']);
    expect(logger.isLevelEnabled('debug')).toBe(false);
    expect(logger.isLevelEnabled('warn')).toBe(true);
  });

  it('sends every level to stderr with the stderr-only writer', () => {
    const lines: string[] = [];
    const logger = createStructuredLogger({
      service: 'tool-server',
      env: 'test',
      level: 'debug',
      writer: createStderrOnlyWriter({
        write: (chunk: string | Uint8Array) => {
          lines.push(String(chunk).trim());
          return true;
        }
      })
    });

    logger.debug({event: 'debug.event', component: 'test'});
    logger.error({event: 'error.event', component: 'test'});

    expect(lines.map(line => parseLine(line).event)).toEqual(['debug.event', 'error.event']);
  });

  it('does not emit when the level is silent', () => {
    const buffer = createBufferedWriter();
    const logger = createStructuredLogger({
      service: 'tool-server',
      env: 'test',
      level: 'silent',
      writer: buffer.writer
    });

    logger.fatal({event: 'fatal.event', component: 'test'});

    expect(buffer.stdout).toHaveLength(0);
    expect(buffer.stderr).toHaveLength(0);
  });

  it('never throws when the writer fails', () => {
    const failingStream = {
      write: () => {
        throw new Error('write failed');
      }
    };
    const logger = createStructuredLogger({
      service: 'tool-server',
      env: 'test',
      level: 'debug',
      writer: {stdout: failingStream, stderr: failingStream}
    });

    expect(() => logger.error({event: 'transport.error', component: 'transport'})).not.toThrow();
  });

  it('drops invalid events without throwing', () => {
    const buffer = createBufferedWriter();
    const logger = createStructuredLogger({
      service: 'tool-server',
      env: 'test',
      level: 'debug',
      writer: buffer.writer
    });

    expect(() => logger.info({event: '', component: 'test'})).not.toThrow();
    expect(buffer.stdout).toHaveLength(0);
  });

  it('sanitizes dates, errors, cycles and deep nesting', () => {
    const circular: Record<string, unknown> = {
      created_at: new Date('2026-01-01T00:00:00.000Z'),
      broken_at: new Date('invalid'),
      count: BigInt(7),
      failure: new Error('failure'),
      callback: () => 'result'
    };
    circular.self = circular;

    let tooDeep: unknown = {value: 'stop'};
    for (let depth = 0; depth < 15; depth += 1) {
      tooDeep = [tooDeep];
    }

    const sanitized = sanitizeForLog({
      value: {customLabel: 'sensitive', circular, tooDeep},
      extraSensitiveKeys: ['customLabel']
    }) as Record<string, unknown>;

    expect(sanitized.customLabel).toBe('[REDACTED]');
    const circularSanitized = sanitized.circular as Record<string, unknown>;
    expect(circularSanitized.created_at).toBe('2026-01-01T00:00:00.000Z');
    expect(circularSanitized.broken_at).toBe('[INVALID_DATE]');
    expect(circularSanitized.count).toBe('7');
    expect(circularSanitized.callback).toBe('[FUNCTION]');
    expect(circularSanitized.self).toBe('[CIRCULAR]');
    expect((circularSanitized.failure as Record<string, unknown>).message).toBe('failure');
    expect(JSON.stringify(sanitized.tooDeep)).toContain('[TRUNCATED]');
  });

  it('provides a no-op logger', () => {
    const noop = createNoopLogger();

    expect(noop.isLevelEnabled('fatal')).toBe(false);
    expect(() => noop.fatal({event: 'test.event', component: 'test'})).not.toThrow();
  });
});
