import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger } from './logger';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prefixes messages with level and component', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    createLogger('drawer').warn('width rejected');
    expect(warn).toHaveBeenCalledWith('[WARN] [drawer] width rejected');
  });

  it('appends data as JSON', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    createLogger('drawer').info('resolved', { width: 300 });
    expect(info).toHaveBeenCalledWith('[INFO] [drawer] resolved {"width":300}');
  });

  it('appends the error stack', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const cause = new Error('boom');
    cause.stack = 'Error: boom\n    at test';
    createLogger('drawer').error('failed', undefined, cause);
    expect(error).toHaveBeenCalledWith('[ERROR] [drawer] failed\nError: boom\n    at test');
  });
});
