/**
 * Configuration accessor with dot-path key support, loadable from YAML.
 */

import { existsSync, readFileSync } from 'node:fs';
import { Type } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import yaml from 'js-yaml';
import { ConfigError, ConfigNotFoundError } from './errors.js';
import { regexFilter } from './filters/types.js';

const StringOrList = Type.Union([Type.String(), Type.Array(Type.String())]);

/** Keys bootmark itself reads; anything else is kept for placeholders. */
export const SettingsSchema = Type.Object({
  autoconfigure: Type.Optional(Type.Object({
    exclude: Type.Optional(StringOrList),
  })),
  scan: Type.Optional(Type.Object({
    'exclude-patterns': Type.Optional(StringOrList),
  })),
  logging: Type.Optional(Type.Object({
    level: Type.Optional(Type.Union([
      Type.Literal('trace'),
      Type.Literal('debug'),
      Type.Literal('info'),
      Type.Literal('warn'),
      Type.Literal('error'),
      Type.Literal('fatal'),
    ])),
    format: Type.Optional(Type.Union([Type.Literal('json'), Type.Literal('text')])),
  })),
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export class Config {
  private _data: Record<string, unknown>;

  constructor(data?: Record<string, unknown>) {
    this._data = data ?? {};
  }

  static load(configPath: string): Config {
    if (!existsSync(configPath)) {
      throw new ConfigNotFoundError(configPath);
    }

    let parsed: unknown;
    try {
      parsed = yaml.load(readFileSync(configPath, 'utf-8'));
    } catch (e) {
      throw new ConfigError(`Invalid YAML in configuration file: ${configPath}`, { configPath }, {
        cause: e instanceof Error ? e : undefined,
      });
    }

    if (parsed === null || parsed === undefined) return new Config();
    if (!isRecord(parsed)) {
      throw new ConfigError(`Configuration file must be a YAML mapping: ${configPath}`, { configPath });
    }
    if (!Value.Check(SettingsSchema, parsed)) {
      const errors = [...Value.Errors(SettingsSchema, parsed)].map((e) => `${e.path || '/'}: ${e.message}`);
      throw new ConfigError(`Invalid configuration in ${configPath}: ${errors.join('; ')}`, { configPath, errors });
    }
    const config = new Config(parsed);
    for (const pattern of config.getList('scan.exclude-patterns')) {
      try {
        regexFilter(pattern);
      } catch (e) {
        throw new ConfigError(`Invalid exclusion pattern '${pattern}' in ${configPath}`, { configPath, pattern }, {
          cause: e instanceof Error && e.cause instanceof Error ? e.cause : undefined,
        });
      }
    }
    return config;
  }

  get(key: string, defaultValue?: unknown): unknown {
    const parts = key.split('.');
    let current: unknown = this._data;
    for (const part of parts) {
      if (isRecord(current) && part in current) {
        current = current[part];
      } else {
        return defaultValue;
      }
    }
    return current;
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  /**
   * A list-valued key. A plain string is split on commas; entries are
   * trimmed and empties dropped.
   */
  getList(key: string): string[] {
    const raw = this.get(key);
    const items = typeof raw === 'string' ? raw.split(',') : Array.isArray(raw) ? raw : [];
    return items
      .filter((item): item is string => typeof item === 'string')
      .map((item) => item.trim())
      .filter((item) => item !== '');
  }
}
