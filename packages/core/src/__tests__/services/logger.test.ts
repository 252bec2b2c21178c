import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import {
  createLogger,
  getDefaultLoggerConfig,
} from '../../services/logger';
import type { LoggerConfig } from '../../services/logger';

const baseConfig: LoggerConfig = {
  level: 'info',
  serviceName: 'test-service',
  environment: 'test',
  version: '1.2.3',
  prettyPrint: false,
};

function lastEntry(spy: { mock: { calls: unknown[][] } }): Record<string, unknown> {
  const call = spy.mock.calls[spy.mock.calls.length - 1];
  const line = call?.[0];
  if (typeof line !== 'string') {
    throw new Error('expected a JSON log line');
  }
  return JSON.parse(line);
}

describe('Logger', () => {
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
    errorSpy.mockRestore();
  });

  it('should write structured JSON entries', () => {
    createLogger(baseConfig).info('Listing contacts', { limit: 5 });

    const entry = lastEntry(logSpy);
    expect(entry).toMatchObject({
      level: 'info',
      message: 'Listing contacts',
      service: 'test-service',
      environment: 'test',
      version: '1.2.3',
      limit: 5,
    });
  });

  it('should redact credential fields at any depth', () => {
    createLogger(baseConfig).info('Calling provider', {
      api_token: 'test-secret',
      request: { apiKey: 'test-secret', path: '/contacts' },
    });

    const entry = lastEntry(logSpy);
    expect(entry.api_token).toBe('[REDACTED]');
    expect(entry.request).toEqual({ apiKey: '[REDACTED]', path: '/contacts' });
  });

  it('should drop entries below the configured level', () => {
    createLogger(baseConfig).debug('noise');
    expect(logSpy).not.toHaveBeenCalled();
  });

  it('should send errors to stderr with the error formatted', () => {
    createLogger(baseConfig).error('Request failed', { error: new TypeError('fetch failed') });

    expect(logSpy).not.toHaveBeenCalled();
    const entry = lastEntry(errorSpy);
    expect(entry.level).toBe('error');
    expect(entry.error).toMatchObject({ name: 'TypeError', message: 'fetch failed' });
  });

  it('should carry child context', () => {
    createLogger(baseConfig).child({ component: 'opentoclose' }).warn('Slow response');

    expect(lastEntry(logSpy)).toMatchObject({
      level: 'warn',
      message: 'Slow response',
      component: 'opentoclose',
    });
  });

  it('should log failed external calls as warnings', () => {
    createLogger(baseConfig).externalService({
      service: 'opentoclose',
      endpoint: 'GET /contacts',
      statusCode: 429,
      success: false,
    });

    expect(lastEntry(logSpy)).toMatchObject({
      level: 'warn',
      message: 'External Service: opentoclose GET /contacts',
      externalService: { service: 'opentoclose', statusCode: 429, success: false },
    });
  });

  describe('getDefaultLoggerConfig', () => {
    it('should read level and service name from the env map', () => {
      const config = getDefaultLoggerConfig({
        NODE_ENV: 'production',
        LOG_LEVEL: 'warn',
        SERVICE_NAME: 'crm-sync',
      });
      expect(config.level).toBe('warn');
      expect(config.serviceName).toBe('crm-sync');
      expect(config.prettyPrint).toBe(false);
    });

    it('should ignore an unknown level', () => {
      const config = getDefaultLoggerConfig({ NODE_ENV: 'production', LOG_LEVEL: 'loud' });
      expect(config.level).toBe('info');
      expect(config.serviceName).toBe('opentoclose-client');
    });
  });
});
