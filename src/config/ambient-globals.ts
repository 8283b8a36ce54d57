import { Capability } from '../kernel/capability.js';
import type { JsonValue } from '../kernel/schemas-document.js';
import type { BindingScope } from '../kernel/scope.js';

export type GuestLog = (message: string) => void;

/** Standard built-ins extracted code may call. `Date` is left out so runs stay deterministic. */
export const BUILTIN_GLOBALS: ReadonlyMap<string, unknown> = new Map<string, unknown>([
  ['Object', Object],
  ['Array', Array],
  ['Math', Math],
  ['JSON', JSON],
  ['String', String],
  ['Number', Number],
  ['Boolean', Boolean],
  ['Map', Map],
  ['Set', Set],
  ['WeakMap', WeakMap],
  ['WeakSet', WeakSet],
  ['Symbol', Symbol],
  ['Reflect', Reflect],
  ['RegExp', RegExp],
  ['Error', Error],
  ['TypeError', TypeError],
  ['RangeError', RangeError],
  ['SyntaxError', SyntaxError],
  ['ReferenceError', ReferenceError],
  ['parseInt', parseInt],
  ['parseFloat', parseFloat],
  ['isNaN', isNaN],
  ['isFinite', isFinite],
  ['NaN', NaN],
  ['Infinity', Infinity],
  ['undefined', undefined],
]);

const isSeedObject = (seed: JsonValue): seed is { [key: string]: JsonValue } =>
  typeof seed === 'object' && seed !== null && !Array.isArray(seed);

/** Plain, closed copy of a `$data` seed: enumerable, with no capability fallback. */
function dataValue(seed: JsonValue): unknown {
  if (Array.isArray(seed)) {
    return seed.map(dataValue);
  }
  if (isSeedObject(seed)) {
    return Object.fromEntries(Object.entries(seed).map(([key, value]) => [key, dataValue(value)]));
  }
  return seed;
}

/**
 * Converts one `globals` entry into the value bound under `path`.
 *
 * Objects become seeded capabilities unless they carry a directive:
 * `{ $echo: true }` answers every member with its own name,
 * `{ $returns: seed }` answers every invocation with the same converted seed,
 * `{ $data: seed }` binds a plain object or array.
 */
export function seedValue(path: string, seed: JsonValue, placeholder: unknown): unknown {
  if (Array.isArray(seed)) {
    return seed.map((entry, index) => seedValue(`${path}.${index}`, entry, placeholder));
  }
  if (!isSeedObject(seed)) {
    return seed;
  }
  if ('$data' in seed) {
    return dataValue(seed.$data ?? null);
  }
  if (seed.$echo === true) {
    return new Capability(path, { placeholder, echo: true });
  }
  if ('$returns' in seed) {
    const value = seedValue(`${path}()`, seed.$returns ?? null, placeholder);
    return new Capability(path, { placeholder, returns: { value } });
  }
  const members = new Map<string, unknown>(
    Object.entries(seed).map(([name, value]) => [name, seedValue(`${path}.${name}`, value, placeholder)]),
  );
  return new Capability(path, { placeholder, seed: members });
}

export function createGuestConsole(log: GuestLog): Record<string, (...args: unknown[]) => void> {
  const write = (...args: unknown[]): void => log(args.map((arg) => String(arg)).join(' '));
  return { log: write, info: write, warn: write, error: write, debug: write, trace: write };
}

export interface AmbientGlobalsOptions {
  readonly globals: Readonly<Record<string, JsonValue>>;
  readonly placeholder: unknown;
  readonly log: GuestLog;
}

/** Binds built-ins, the CommonJS module shell, the guest console, then the configured seeds. */
export function bindAmbientGlobals(scope: BindingScope, options: AmbientGlobalsOptions): void {
  for (const [name, value] of BUILTIN_GLOBALS) {
    scope.declare(name, value, 'const');
  }
  const exports: Record<string, unknown> = {};
  scope.declare('exports', exports, 'var');
  scope.declare('module', { exports }, 'var');
  scope.declare('console', createGuestConsole(options.log), 'var');

  for (const [name, seed] of Object.entries(options.globals)) {
    scope.declare(name, seedValue(name, seed, options.placeholder), 'var');
  }
}
