import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config.js';
import { ConfigError } from '../src/errors.js';

describe('loadConfig', () => {
  it('defaults to compare-only mode rooted at cwd', () => {
    expect(loadConfig({}, '/work')).toEqual({ update: false, root: '/work', debug: false });
  });

  it('accepts the usual switch spellings', () => {
    for (const value of ['always', '1', 'true', 'ON', ' yes ']) {
      expect(loadConfig({ SNAPWARD_UPDATE: value }, '/work').update).toBe(true);
    }
    for (const value of ['no', '0', 'False', 'off']) {
      expect(loadConfig({ SNAPWARD_UPDATE: value }, '/work').update).toBe(false);
    }
  });

  it('reads root and debug', () => {
    expect(loadConfig({ SNAPWARD_ROOT: '/repo', SNAPWARD_DEBUG: '1' }, '/work')).toEqual({
      update: false,
      root: '/repo',
      debug: true,
    });
  });

  it('ignores unrelated variables', () => {
    expect(loadConfig({ PATH: '/usr/bin', CI: 'true' }, '/work').update).toBe(false);
  });

  it('rejects unknown switch values', () => {
    expect(() => loadConfig({ SNAPWARD_UPDATE: 'sometimes' }, '/work')).toThrow(ConfigError);

    try {
      loadConfig({ SNAPWARD_UPDATE: 'sometimes' }, '/work');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.issues).toHaveLength(1);
        expect(error.issues[0]).toMatch(/^SNAPWARD_UPDATE: /);
      }
    }
  });

  it('treats empty variables as unset', () => {
    expect(loadConfig({ SNAPWARD_UPDATE: '', SNAPWARD_ROOT: '', SNAPWARD_DEBUG: '' }, '/work')).toEqual({
      update: false,
      root: '/work',
      debug: false,
    });
  });

  it('still rejects blank switch values', () => {
    expect(() => loadConfig({ SNAPWARD_UPDATE: '  ' }, '/work')).toThrow('Invalid snapward configuration');
  });
});
