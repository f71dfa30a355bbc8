import { describe, it, expect } from 'vitest';
import {
  BootstrapError,
  ConfigNotFoundError,
  ConfigError,
  InvalidInputError,
  MalformedUnitError,
  AliasCycleError,
  AliasConflictError,
  DiscoveryError,
  BootstrapCancelledError,
  ErrorCodes,
} from '../src/errors.js';

describe('BootstrapError', () => {
  it('creates with code and message', () => {
    const err = new BootstrapError('TEST_CODE', 'test message');
    expect(err.code).toBe('TEST_CODE');
    expect(err.message).toBe('test message');
    expect(err.name).toBe('BootstrapError');
    expect(err.details).toEqual({});
    expect(err.retryable).toBe(false);
    expect(err.suggestion).toBeNull();
  });

  it('toString includes code and message', () => {
    expect(new BootstrapError('ERR', 'something failed').toString()).toBe('[ERR] something failed');
  });

  it('accepts details, cause, and bootstrapId', () => {
    const cause = new Error('root cause');
    const err = new BootstrapError('X', 'msg', { key: 'val' }, cause, 'run-1');
    expect(err.details).toEqual({ key: 'val' });
    expect(err.cause).toBe(cause);
    expect(err.bootstrapId).toBe('run-1');
  });

  it('toJSON omits empty details and includes the run id', () => {
    const json = new BootstrapError('X', 'msg', undefined, undefined, 'run-2').toJSON();
    expect(json['code']).toBe('X');
    expect(json['message']).toBe('msg');
    expect(json['details']).toBeUndefined();
    expect(json['bootstrap_id']).toBe('run-2');
    expect(json['retryable']).toBe(false);
  });
});

describe('MalformedUnitError', () => {
  it('names the unit and the reason', () => {
    const err = new MalformedUnitError('Route', 'bad default');
    expect(err.code).toBe('MALFORMED_UNIT');
    expect(err.message).toBe("Malformed unit 'Route': bad default");
    expect(err.unit).toBe('Route');
    expect(err).toBeInstanceOf(BootstrapError);
  });
});

describe('AliasCycleError', () => {
  it('renders the cycle path', () => {
    const err = new AliasCycleError(['A.x', 'A.y', 'A.x']);
    expect(err.code).toBe('ALIAS_CYCLE');
    expect(err.message).toBe('Alias cycle detected: A.x -> A.y -> A.x');
    expect(err.cyclePath).toEqual(['A.x', 'A.y', 'A.x']);
  });
});

describe('AliasConflictError', () => {
  it('lists every conflicting assignment', () => {
    const err = new AliasConflictError([
      { key: 'A.x', value: ['a'] },
      { key: 'A.y', value: ['b'] },
    ]);
    expect(err.code).toBe('ALIAS_CONFLICT');
    expect(err.message).toBe('Aliased attributes declared with different values: A.x=["a"], A.y=["b"]');
    expect(err.details).toEqual({ keys: ['A.x', 'A.y'] });
    expect(err.conflicts).toHaveLength(2);
    expect(err.suggestion).toBe('Declare only one of the aliased attributes, or give them the same value.');
  });

  it('allows overriding the suggestion', () => {
    const err = new AliasConflictError([{ key: 'A.x', value: 1 }], { suggestion: 'pick one' });
    expect(err.suggestion).toBe('pick one');
  });
});

describe('other errors', () => {
  it('ConfigNotFoundError records the path', () => {
    const err = new ConfigNotFoundError('/missing.yaml');
    expect(err.code).toBe('CONFIG_NOT_FOUND');
    expect(err.message).toBe('Configuration file not found: /missing.yaml');
    expect(err.details).toEqual({ configPath: '/missing.yaml' });
  });

  it('ConfigError carries details', () => {
    const err = new ConfigError('bad', { configPath: 'x' });
    expect(err.code).toBe('CONFIG_INVALID');
    expect(err.details).toEqual({ configPath: 'x' });
  });

  it('InvalidInputError has a default message', () => {
    expect(new InvalidInputError().message).toBe('Invalid input');
  });

  it('DiscoveryError wraps the reason and cause', () => {
    const cause = new Error('boom');
    const err = new DiscoveryError('boom', { cause, bootstrapId: 'run-3' });
    expect(err.code).toBe('DISCOVERY_FAILED');
    expect(err.message).toBe('Automatic discovery failed: boom');
    expect(err.cause).toBe(cause);
    expect(err.toJSON()['cause']).toBe('Error: boom');
  });

  it('BootstrapCancelledError has a default message', () => {
    const err = new BootstrapCancelledError();
    expect(err.code).toBe('BOOTSTRAP_CANCELLED');
    expect(err.message).toBe('Bootstrap was cancelled');
  });
});

describe('ErrorCodes', () => {
  it('maps every code to itself', () => {
    for (const [key, value] of Object.entries(ErrorCodes)) {
      expect(value).toBe(key);
    }
  });

  it('is frozen', () => {
    expect(Object.isFrozen(ErrorCodes)).toBe(true);
  });
});
