import { describe, it, expect } from 'vitest';
import { ConfigurationManager } from './configurationManager.js';
import { LogLevel } from '../utils/Logger.js';
import { UsageError } from '../utils/errors.js';

describe('ConfigurationManager', () => {
  it('should start from the defaults', () => {
    expect(new ConfigurationManager().getConfig()).toEqual({
      targetClass: undefined,
      delegate: false,
      realInstanceName: 'real',
      logLevel: LogLevel.WARN
    });
  });

  it('should apply command-line options', () => {
    const manager = new ConfigurationManager();
    manager.updateFromCliOptions({ targetClass: ' Widget ', delegate: true, real: 'impl_', verbose: true });

    expect(manager.getConfig()).toEqual({
      targetClass: 'Widget',
      delegate: true,
      realInstanceName: 'impl_',
      logLevel: LogLevel.DEBUG
    });
  });

  it('should ignore a blank target class', () => {
    const manager = new ConfigurationManager();
    manager.updateFromCliOptions({ targetClass: '   ' });
    expect(manager.getConfig().targetClass).toBeUndefined();
  });

  it('should ignore missing options', () => {
    const manager = new ConfigurationManager();
    manager.updateFromCliOptions(null);
    manager.updateFromCliOptions(undefined);
    expect(manager.getConfig().delegate).toBe(false);
  });

  it('should reject a real instance name that is not an identifier', () => {
    const manager = new ConfigurationManager();
    expect(() => manager.updateFromCliOptions({ real: 'real->impl' })).toThrow(UsageError);
    expect(manager.getConfig().realInstanceName).toBe('real');
  });

  it('should hand out copies', () => {
    const manager = new ConfigurationManager();
    manager.getConfig().delegate = true;
    expect(manager.getConfig().delegate).toBe(false);
  });
});
