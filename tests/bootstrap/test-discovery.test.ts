import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  ImportsFileDiscoverer,
  StaticDiscoverer,
  parseImports,
  removeDuplicates,
} from '../../src/bootstrap/discovery.js';
import { touch } from '../helpers.js';

let tempDir: string;

beforeEach(() => {
  tempDir = mkdtempSync(join(tmpdir(), 'discovery-test-'));
});

afterEach(() => {
  rmSync(tempDir, { recursive: true, force: true });
  vi.restoreAllMocks();
});

describe('removeDuplicates', () => {
  it('keeps the first occurrence', () => {
    expect(removeDuplicates(['b', 'a', 'b', 'c', 'a'])).toEqual(['b', 'a', 'c']);
  });
});

describe('parseImports', () => {
  it('reads one name per line, ignoring comments and blanks', () => {
    const content = '# auto-configurations\ncom.acme.A\n\n  com.acme.B  # inline\r\n#com.acme.Disabled\ncom.acme.C\n';
    expect(parseImports(content)).toEqual(['com.acme.A', 'com.acme.B', 'com.acme.C']);
  });
});

describe('StaticDiscoverer', () => {
  it('returns its candidates without duplicates', () => {
    expect(new StaticDiscoverer(['a.A', 'a.B', 'a.A']).discover()).toEqual(['a.A', 'a.B']);
  });
});

describe('ImportsFileDiscoverer', () => {
  it('reads every file in order', () => {
    const first = touch(tempDir, 'one/bootmark.imports', 'com.acme.A\ncom.acme.B\n');
    const second = touch(tempDir, 'two/bootmark.imports', 'com.acme.B\ncom.acme.C\n');
    expect(new ImportsFileDiscoverer([first, second]).discover()).toEqual(['com.acme.A', 'com.acme.B', 'com.acme.C']);
  });

  it('accepts a single path', () => {
    const path = touch(tempDir, 'bootmark.imports', 'com.acme.A\n');
    expect(new ImportsFileDiscoverer(path).discover()).toEqual(['com.acme.A']);
  });

  it('warns and skips missing files', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const path = touch(tempDir, 'bootmark.imports', 'com.acme.A\n');
    const discoverer = new ImportsFileDiscoverer([join(tempDir, 'missing.imports'), path]);
    expect(discoverer.discover()).toEqual(['com.acme.A']);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
