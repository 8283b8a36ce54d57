export interface CapabilityOptions {
  readonly placeholder: unknown;
  readonly seed?: ReadonlyMap<string, unknown>;
  readonly echo?: boolean;
  readonly returns?: { readonly value: unknown };
}

/** Base whose instances are host functions carrying the subclass's prototype and private state. */
abstract class CallableObject {
  protected constructor(call: (...args: unknown[]) => unknown) {
    const callable: object = Object.setPrototypeOf(call, new.target.prototype);
    return callable;
  }
}

/** Calling a capability directly forwards to `invoke`. */
export interface Capability {
  (...args: unknown[]): unknown;
}

/**
 * Stand-in for a value the extracted source expects from its absent runtime.
 *
 * Member reads answer with a memoized child capability (or a seeded value),
 * and invoking a capability, as a function or constructor, forwards its first
 * argument or answers with the run's placeholder literal. Each capability is a
 * real function, so host built-ins handed one as a callback (`map`, `sort`,
 * `Reflect.apply`) invoke it the same way. State lives in private fields so
 * host reflection (`Object.keys`, spreads) sees no members.
 */
export class Capability extends CallableObject {
  readonly #path: string;
  readonly #options: CapabilityOptions;
  readonly #members = new Map<string, unknown>();

  constructor(path: string, options: CapabilityOptions) {
    super((...args: unknown[]): unknown => capability.invoke(args));
    const capability = this;
    this.#path = path;
    this.#options = options;
    for (const [name, value] of options.seed ?? []) {
      this.#members.set(name, value);
    }
  }

  get path(): string {
    return this.#path;
  }

  member(name: string): unknown {
    if (this.#members.has(name)) {
      return this.#members.get(name);
    }
    if (this.#options.echo === true) {
      return name;
    }

    const child = new Capability(`${this.#path}.${name}`, { placeholder: this.#options.placeholder });
    this.#members.set(name, child);
    return child;
  }

  assign(name: string, value: unknown): void {
    this.#members.set(name, value);
  }

  remove(name: string): boolean {
    return this.#members.delete(name);
  }

  /** Members that were seeded or assigned, in insertion order. */
  keys(): readonly string[] {
    return [...this.#members.entries()].filter(([, value]) => !(value instanceof Capability)).map(([name]) => name);
  }

  invoke(args: readonly unknown[]): unknown {
    if (this.#options.returns !== undefined) {
      return this.#options.returns.value;
    }
    return args[0] ?? this.#options.placeholder;
  }

  toString(): string {
    return this.#path;
  }
}

export const isCapability = (value: unknown): value is Capability => value instanceof Capability;
