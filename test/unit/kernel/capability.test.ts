import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { createCapabilityResolver } from '../../../src/kernel/capability-resolver.js';
import { Capability, isCapability } from '../../../src/kernel/capability.js';
import { Scope } from '../../../src/kernel/scope.js';

describe('Capability', () => {
  it('memoizes child capabilities by member name', () => {
    const root = new Capability('App', { placeholder: 'mock' });
    const first = root.member('game');
    const second = root.member('game');

    assert.equal(first, second);
    assert.ok(isCapability(first));
    assert.equal(isCapability(first) ? first.path : undefined, 'App.game');
  });

  it('answers seeded members before creating children', () => {
    const root = new Capability('GameConstants', {
      placeholder: 'mock',
      seed: new Map<string, unknown>([['MINUTE', 60]]),
    });

    assert.equal(root.member('MINUTE'), 60);
    assert.deepEqual(root.keys(), ['MINUTE']);
  });

  it('echoes member names when configured', () => {
    const badges = new Capability('BadgeEnums', { placeholder: 'mock', echo: true });
    assert.equal(badges.member('Boulder'), 'Boulder');
  });

  it('forwards the first argument or falls back to the placeholder', () => {
    const capability = new Capability('Helper', { placeholder: 'mock' });

    assert.equal(capability.invoke([3, 4]), 3);
    assert.equal(capability.invoke([]), 'mock');
    assert.equal(capability.invoke([undefined]), 'mock');
  });

  it('answers a fixed return value when configured', () => {
    const capability = new Capability('hasBadge', { placeholder: 'mock', returns: { value: true } });
    assert.equal(capability.invoke(['x']), true);
  });

  it('tracks assigned members and hides them from host reflection', () => {
    const capability = new Capability('Store', { placeholder: 'mock' });
    capability.assign('count', 2);
    capability.member('child');

    assert.deepEqual(capability.keys(), ['count']);
    assert.deepEqual(Object.keys(capability), []);
    assert.equal(capability.remove('count'), true);
    assert.deepEqual(capability.keys(), []);
    assert.equal(String(capability), 'Store');
  });

  it('is callable by host code that receives it as a callback', () => {
    const merge = new Capability('TextMerger.mergeText', { placeholder: 'mock' });

    assert.equal(typeof merge, 'function');
    assert.deepEqual(['a', 'b'].map(merge), ['a', 'b']);
    assert.equal(Reflect.apply(merge, undefined, []), 'mock');
  });
});

describe('createCapabilityResolver', () => {
  const globalScope = (): Scope => Scope.createGlobal(() => undefined);

  it('returns the existing binding when the name is declared', () => {
    const scope = globalScope();
    scope.declare('known', 5);
    const resolver = createCapabilityResolver({ placeholder: 'mock' });

    assert.equal(resolver.resolve(scope, 'known'), 5);
  });

  it('binds companion names to frozen name references', () => {
    const scope = globalScope();
    let reads = 0;
    const resolver = createCapabilityResolver({
      placeholder: 'mock',
      nameBindings: () => {
        reads += 1;
        return new Map([['ProfOak', 'Professor Oak']]);
      },
    });

    const reference = resolver.resolve(scope, 'ProfOak');
    resolver.resolve(scope, 'Other');

    assert.deepEqual(reference, { name: 'Professor Oak' });
    assert.ok(Object.isFrozen(reference));
    assert.equal(scope.get('ProfOak'), reference);
    assert.equal(reads, 1);
  });

  it('binds structurally matching names to the variant constructor', () => {
    class Base {}
    const scope = globalScope();
    const resolver = createCapabilityResolver({
      placeholder: 'mock',
      structuralMatch: (name) => (name.endsWith('Requirement') ? Base : undefined),
    });

    assert.equal(resolver.resolve(scope, 'NewRequirement'), Base);
    assert.ok(isCapability(resolver.resolve(scope, 'Unrelated')));
  });

  it('declares the capability it creates so later lookups share it', () => {
    const scope = globalScope();
    const resolver = createCapabilityResolver({ placeholder: 'mock' });
    const created = resolver.resolve(scope, 'Settings');

    assert.equal(resolver.resolve(scope, 'Settings'), created);
    assert.ok(scope.has('Settings'));
  });
});
