import { describe, it, expect } from 'vitest';
import { resolveConfigFile } from '../config-file';

describe('resolveConfigFile', () => {
  it('takes the path after --config-file', () => {
    expect(resolveConfigFile(['--config-file', '/etc/launchpad.json'], {})).toBe('/etc/launchpad.json');
  });

  it('takes the inline form', () => {
    expect(resolveConfigFile(['--verbose', '--config-file=conf/launchpad.json'], {})).toBe('conf/launchpad.json');
  });

  it('prefers the flag over LAUNCHPAD_CONFIG', () => {
    expect(resolveConfigFile(['--config-file', 'a.json'], { LAUNCHPAD_CONFIG: 'b.json' })).toBe('a.json');
  });

  it('falls back to LAUNCHPAD_CONFIG', () => {
    expect(resolveConfigFile([], { LAUNCHPAD_CONFIG: 'b.json' })).toBe('b.json');
  });

  it('rejects a flag without a path', () => {
    expect(() => resolveConfigFile(['--config-file'], {})).toThrow('--config-file requires a path');
    expect(() => resolveConfigFile(['--config-file', '--verbose'], {})).toThrow('--config-file requires a path');
    expect(() => resolveConfigFile(['--config-file='], {})).toThrow('--config-file requires a path');
  });

  it('fails when nothing names a file', () => {
    expect(() => resolveConfigFile([], {})).toThrow('Configuration file is not set');
    expect(() => resolveConfigFile([], { LAUNCHPAD_CONFIG: '' })).toThrow('Configuration file is not set');
  });
});
