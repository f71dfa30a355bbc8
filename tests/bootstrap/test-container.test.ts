import { describe, it, expect, vi } from 'vitest';
import {
  CONTAINER_EVENTS,
  ComponentRegistry,
  defaultNaming,
  type ComponentRegistration,
  type RegistrationOptions,
} from '../../src/bootstrap/container.js';
import { InvalidInputError } from '../../src/errors.js';
import { TypeRef } from '../../src/type-ref.js';

const OPTIONS: RegistrationOptions = { proxyBeanMethods: true, nameGenerator: null, lazyInit: false };

describe('defaultNaming', () => {
  it('lower-cases the first letter of the simple name', () => {
    expect(defaultNaming('com.example.web.UserController')).toBe('userController');
    expect(defaultNaming('Standalone')).toBe('standalone');
  });
});

describe('ComponentRegistry', () => {
  it('registers explicit components with the given options', () => {
    const registry = new ComponentRegistry();
    registry.registerExplicit(['com.example.DemoApplication'], { ...OPTIONS, proxyBeanMethods: false, lazyInit: true });
    expect(registry.get('com.example.DemoApplication')).toEqual({
      identity: 'com.example.DemoApplication',
      componentName: 'demoApplication',
      source: 'explicit',
      proxyBeanMethods: false,
      lazyInit: true,
    });
    expect(registry.has('com.example.DemoApplication')).toBe(true);
    expect(registry.get('com.example.Nope')).toBeNull();
  });

  it('uses a registered naming strategy for an explicit generator', () => {
    const generator = TypeRef.of('com.example.naming.FqnGenerator');
    const registry = new ComponentRegistry();
    registry.registerNamingStrategy(generator, (identity) => identity);
    registry.registerExplicit(['com.example.Demo'], { ...OPTIONS, nameGenerator: generator });
    expect(registry.get('com.example.Demo')?.componentName).toBe('com.example.Demo');
  });

  it('rejects an unknown generator before registering anything', () => {
    const registry = new ComponentRegistry();
    const generator = TypeRef.of('com.example.naming.Unknown');
    expect(() => registry.registerExplicit(['com.example.Demo'], { ...OPTIONS, nameGenerator: generator })).toThrow(
      "No naming strategy registered for 'com.example.naming.Unknown'",
    );
    expect(registry.count).toBe(0);
  });

  it('rejects duplicate explicit registrations as a batch', () => {
    const registry = new ComponentRegistry();
    registry.registerExplicit(['a.One'], OPTIONS);
    expect(() => registry.registerExplicit(['a.Two', 'a.One'], OPTIONS)).toThrow(InvalidInputError);
    expect(() => registry.registerExplicit(['a.Three', 'a.Three'], OPTIONS)).toThrow('Component already registered: a.Three');
    expect(registry.count).toBe(1);
  });

  it('skips deferred imports that are already registered', () => {
    const registry = new ComponentRegistry();
    registry.registerExplicit(['com.acme.B'], OPTIONS);
    const outcome = registry.applyDeferredImports(['com.acme.A', 'com.acme.B', 'com.acme.C']);
    expect(outcome).toEqual({ imported: ['com.acme.A', 'com.acme.C'], skipped: ['com.acme.B'] });
    expect(registry.get('com.acme.B')?.source).toBe('explicit');
    expect(registry.get('com.acme.A')).toEqual({
      identity: 'com.acme.A',
      componentName: 'com.acme.A',
      source: 'auto-configuration',
      proxyBeanMethods: true,
      lazyInit: false,
    });
  });

  it('lists registrations in application order', () => {
    const registry = new ComponentRegistry();
    registry.registerExplicit(['a.Entry', 'a.Scanned'], OPTIONS);
    registry.applyDeferredImports(['b.Auto']);
    expect(registry.list().map((r) => r.identity)).toEqual(['a.Entry', 'a.Scanned', 'b.Auto']);
    expect(registry.list('auto-configuration').map((r) => r.identity)).toEqual(['b.Auto']);
  });

  it('emits register and import events', () => {
    const registry = new ComponentRegistry();
    const registered: string[] = [];
    const imported: string[] = [];
    registry.on(CONTAINER_EVENTS.REGISTER, (r: ComponentRegistration) => registered.push(r.identity));
    registry.on(CONTAINER_EVENTS.IMPORT, (r: ComponentRegistration) => imported.push(r.identity));
    registry.registerExplicit(['a.Entry'], OPTIONS);
    registry.applyDeferredImports(['b.Auto', 'a.Entry']);
    expect(registered).toEqual(['a.Entry']);
    expect(imported).toEqual(['b.Auto']);
  });

  it('keeps going when a callback throws', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const registry = new ComponentRegistry();
    registry.on(CONTAINER_EVENTS.REGISTER, () => {
      throw new Error('callback failed');
    });
    registry.registerExplicit(['a.One', 'a.Two'], OPTIONS);
    expect(registry.count).toBe(2);
    expect(warn).toHaveBeenCalledTimes(2);
    warn.mockRestore();
  });

  it('accepts a custom default naming strategy', () => {
    const registry = new ComponentRegistry({ naming: (identity) => identity.toUpperCase() });
    registry.registerExplicit(['a.One'], OPTIONS);
    expect(registry.get('a.One')?.componentName).toBe('A.ONE');
  });
});
