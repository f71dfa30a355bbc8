import { describe, it, expect } from 'vitest';
import { Logger } from '../../src/observability/logger.js';
import { Config } from '../../src/config.js';

function capture(): { lines: string[]; output: { write: (s: string) => void } } {
  const lines: string[] = [];
  return { lines, output: { write: (s: string) => { lines.push(s); } } };
}

describe('Logger', () => {
  it('writes JSON entries', () => {
    const { lines, output } = capture();
    new Logger({ name: 'test', output }).info('hello', { key: 'value' });
    expect(lines).toHaveLength(1);
    expect(lines[0].endsWith('\n')).toBe(true);
    const entry = JSON.parse(lines[0]) as Record<string, unknown>;
    expect(entry['level']).toBe('info');
    expect(entry['message']).toBe('hello');
    expect(entry['logger']).toBe('test');
    expect(entry['bootstrap_id']).toBeNull();
    expect(entry['extra']).toEqual({ key: 'value' });
  });

  it('filters entries below its level', () => {
    const { lines, output } = capture();
    const logger = new Logger({ level: 'warn', output });
    logger.debug('skip');
    logger.info('skip');
    logger.warn('keep');
    logger.error('keep');
    expect(lines).toHaveLength(2);
    expect(logger.isEnabled('info')).toBe(false);
    expect(logger.isEnabled('fatal')).toBe(true);
  });

  it('redacts secret extras', () => {
    const { lines, output } = capture();
    new Logger({ output }).info('login', { _secret_token: 'test-secret', user: 'alice' });
    const entry = JSON.parse(lines[0]) as Record<string, unknown>;
    expect(entry['extra']).toEqual({ _secret_token: '***REDACTED***', user: 'alice' });
  });

  it('leaves secrets when redaction is off', () => {
    const { lines, output } = capture();
    new Logger({ output, redactSensitive: false }).info('login', { _secret_token: 'test-secret' });
    const entry = JSON.parse(lines[0]) as Record<string, unknown>;
    expect(entry['extra']).toEqual({ _secret_token: 'test-secret' });
  });

  it('writes text entries', () => {
    const { lines, output } = capture();
    new Logger({ name: 'boot', format: 'text', output }).warn('careful', { n: 1, s: 'x' });
    expect(lines[0]).toMatch(
      /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2} \[WARN\] \[run=none\] \[boot\] careful n=1 s="x"\n$/,
    );
  });

  it('forRun stamps the run id and keeps the level', () => {
    const { lines, output } = capture();
    const run = new Logger({ level: 'error', output }).forRun('run-42', 'bootmark.run');
    run.warn('skipped');
    run.error('kept');
    expect(lines).toHaveLength(1);
    const entry = JSON.parse(lines[0]) as Record<string, unknown>;
    expect(entry['bootstrap_id']).toBe('run-42');
    expect(entry['logger']).toBe('bootmark.run');
  });

  it('fromConfig reads level and format', () => {
    const { lines, output } = capture();
    const config = new Config({ logging: { level: 'debug', format: 'text' } });
    const logger = Logger.fromConfig(config, { output });
    logger.debug('visible');
    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('[DEBUG] [run=none] [bootmark] visible');
  });

  it('fromConfig falls back to the given options', () => {
    const { lines, output } = capture();
    const logger = Logger.fromConfig(new Config({ logging: { level: 'noisy' } }), { level: 'error', output });
    logger.warn('hidden');
    expect(lines).toHaveLength(0);
  });
});
