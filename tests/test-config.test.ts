import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Config } from '../src/config.js';
import { ConfigError, ConfigNotFoundError } from '../src/errors.js';

let tempDir: string;

beforeEach(() => {
  tempDir = mkdtempSync(join(tmpdir(), 'config-test-'));
});

afterEach(() => {
  rmSync(tempDir, { recursive: true, force: true });
});

function writeConfig(content: string): string {
  const path = join(tempDir, 'bootmark.yaml');
  writeFileSync(path, content);
  return path;
}

describe('Config', () => {
  it('creates with no arguments', () => {
    expect(new Config().get('anything')).toBeUndefined();
  });

  it('traverses nested objects with dot-path', () => {
    const cfg = new Config({ app: { base: { package: 'com.example' } } });
    expect(cfg.get('app.base.package')).toBe('com.example');
    expect(cfg.get('app.base.missing', 'fallback')).toBe('fallback');
    expect(cfg.get('app.base.package.deeper')).toBeUndefined();
  });

  it('has reports presence', () => {
    const cfg = new Config({ a: { b: 0 } });
    expect(cfg.has('a.b')).toBe(true);
    expect(cfg.has('a.c')).toBe(false);
  });

  it('getList splits a comma-separated string', () => {
    const cfg = new Config({ autoconfigure: { exclude: ' com.a.One , ,com.b.Two' } });
    expect(cfg.getList('autoconfigure.exclude')).toEqual(['com.a.One', 'com.b.Two']);
  });

  it('getList trims list entries and drops empties', () => {
    const cfg = new Config({ scan: { 'exclude-patterns': [' .*Test ', ''] } });
    expect(cfg.getList('scan.exclude-patterns')).toEqual(['.*Test']);
  });

  it('getList returns an empty list for missing or non-list keys', () => {
    const cfg = new Config({ n: 3 });
    expect(cfg.getList('missing')).toEqual([]);
    expect(cfg.getList('n')).toEqual([]);
  });
});

describe('Config.load', () => {
  it('loads a valid YAML file', () => {
    const path = writeConfig(
      'autoconfigure:\n  exclude:\n    - com.acme.DataAutoConfiguration\nlogging:\n  level: debug\napp:\n  base: com.example\n',
    );
    const cfg = Config.load(path);
    expect(cfg.getList('autoconfigure.exclude')).toEqual(['com.acme.DataAutoConfiguration']);
    expect(cfg.get('logging.level')).toBe('debug');
    expect(cfg.get('app.base')).toBe('com.example');
  });

  it('treats an empty file as an empty configuration', () => {
    const cfg = Config.load(writeConfig(''));
    expect(cfg.get('anything')).toBeUndefined();
  });

  it('throws ConfigNotFoundError for a missing file', () => {
    expect(() => Config.load(join(tempDir, 'nope.yaml'))).toThrow(ConfigNotFoundError);
  });

  it('throws ConfigError for invalid YAML', () => {
    expect(() => Config.load(writeConfig('key: [unclosed\n'))).toThrow(ConfigError);
  });

  it('throws ConfigError when the document is not a mapping', () => {
    expect(() => Config.load(writeConfig('- a\n- b\n'))).toThrow('Configuration file must be a YAML mapping');
  });

  it('throws ConfigError for an invalid exclusion pattern', () => {
    const path = writeConfig('scan:\n  exclude-patterns:\n    - com.(bad\n');
    expect(() => Config.load(path)).toThrow(ConfigError);
    expect(() => Config.load(path)).toThrow(`Invalid exclusion pattern 'com.(bad' in ${path}`);
  });

  it('throws ConfigError when a known key has the wrong shape', () => {
    const path = writeConfig('logging:\n  level: loud\n');
    expect(() => Config.load(path)).toThrow(ConfigError);
    expect(() => Config.load(path)).toThrow(`Invalid configuration in ${path}`);
  });
});
