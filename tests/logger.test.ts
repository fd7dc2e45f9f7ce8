import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createLogger } from '../src/utils/logger.js';

describe('Logger', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    delete process.env.DEBUG;
    delete process.env.LOG_LEVEL;
  });

  afterEach(() => {
    vi.restoreAllMocks();
    delete process.env.DEBUG;
    delete process.env.LOG_LEVEL;
  });

  it('should tag lines with the prefix and level', () => {
    const logger = createLogger('Webhook');
    logger.info('accepted');
    logger.warn('unsigned', 'extra');
    logger.error('failed');

    expect(vi.mocked(console.log).mock.calls[0][0]).toMatch(/^\[\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\] \[Webhook\] accepted$/);
    expect(vi.mocked(console.warn).mock.calls[0][0]).toMatch(/\[Webhook\] \[WARN\] unsigned$/);
    expect(vi.mocked(console.warn).mock.calls[0][1]).toBe('extra');
    expect(vi.mocked(console.error).mock.calls[0][0]).toMatch(/\[Webhook\] \[ERROR\] failed$/);
  });

  it('should hide debug output by default', () => {
    createLogger('Test').debug('hidden');
    expect(console.log).not.toHaveBeenCalled();
  });

  it('should honour LOG_LEVEL', () => {
    process.env.LOG_LEVEL = 'warn';
    const logger = createLogger('Test');
    logger.info('hidden');
    logger.warn('shown');

    expect(console.log).not.toHaveBeenCalled();
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('should enable debug output when DEBUG is set', () => {
    process.env.DEBUG = '1';
    createLogger('Test').debug('shown');
    expect(vi.mocked(console.log).mock.calls[0][0]).toMatch(/\[Test\] \[DEBUG\] shown$/);
  });

  it('should print raw output without decoration', () => {
    createLogger('Main').raw('usage text');
    expect(console.log).toHaveBeenCalledWith('usage text');
  });
});
