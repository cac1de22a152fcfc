import { afterEach, describe, expect, it, vi } from 'vitest';

import { consoleLogger } from './logger';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('consoleLogger', () => {
  it('prefixes messages', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    consoleLogger.info('Permissions file changed. Reloading...');
    consoleLogger.warn('careful');

    expect(log).toHaveBeenCalledWith(
      '[PermissionRegistry] Permissions file changed. Reloading...'
    );
    expect(warn).toHaveBeenCalledWith('[PermissionRegistry] careful');
  });

  it('passes the error along when there is one', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const cause = new Error('boom');

    consoleLogger.error('Failed to reload', cause);
    consoleLogger.error('Failed again');

    expect(error.mock.calls).toEqual([
      ['[PermissionRegistry] Failed to reload', cause],
      ['[PermissionRegistry] Failed again'],
    ]);
  });
});
