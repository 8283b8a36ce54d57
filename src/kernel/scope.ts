import { guestTypeError } from './extraction-error.js';

export type BindingKind = 'var' | 'let' | 'const' | 'function' | 'class' | 'param' | 'ambient';

export type ScopeKind = 'global' | 'function' | 'block';

interface Binding {
  value: unknown;
  readonly kind: BindingKind;
}

/**
 * `this`/`super` state of one function activation. Arrow functions share the
 * frame of the function they were created in.
 */
export interface ExecutionFrame {
  thisValue: unknown;
  thisInitialized: boolean;
  readonly newTarget?: Function;
  readonly parentConstructor?: unknown;
  readonly homeObject?: object;
}

/** The minimal view of a scope the capability resolver works against. */
export interface BindingScope {
  has(name: string): boolean;
  get(name: string): unknown;
  declare(name: string, value: unknown, kind?: BindingKind): void;
}

export type UnboundNameHandler = (scope: Scope, name: string) => unknown;

export class Scope implements BindingScope {
  private readonly bindings = new Map<string, Binding>();

  constructor(
    readonly parent: Scope | null,
    readonly kind: ScopeKind,
    readonly frame?: ExecutionFrame,
    private readonly onUnbound?: UnboundNameHandler,
  ) {}

  static createGlobal(onUnbound: UnboundNameHandler): Scope {
    return new Scope(null, 'global', { thisValue: undefined, thisInitialized: true }, onUnbound);
  }

  has(name: string): boolean {
    return this.bindings.has(name);
  }

  get(name: string): unknown {
    return this.bindings.get(name)?.value;
  }

  declare(name: string, value: unknown, kind: BindingKind = 'var'): void {
    const existing = this.bindings.get(name);
    if (existing !== undefined && kind === 'var') {
      existing.value = value;
      return;
    }
    this.bindings.set(name, { value, kind });
  }

  lookup(name: string): unknown {
    for (let scope: Scope | null = this; scope !== null; scope = scope.parent) {
      const binding = scope.bindings.get(name);
      if (binding !== undefined) {
        return binding.value;
      }
      if (scope.parent === null && scope.onUnbound !== undefined) {
        return scope.onUnbound(scope, name);
      }
    }
    return undefined;
  }

  assign(name: string, value: unknown): void {
    let root: Scope = this;
    for (let scope: Scope | null = this; scope !== null; scope = scope.parent) {
      const binding = scope.bindings.get(name);
      if (binding !== undefined) {
        if (binding.kind === 'const' || binding.kind === 'class') {
          throw guestTypeError(`Assignment to constant variable '${name}'.`, { name });
        }
        binding.value = value;
        return;
      }
      root = scope;
    }
    root.declare(name, value, 'var');
  }

  /** Nearest scope that owns `var` declarations. */
  variableScope(): Scope {
    for (let scope: Scope | null = this; scope !== null; scope = scope.parent) {
      if (scope.kind !== 'block') {
        return scope;
      }
    }
    return this;
  }

  currentFrame(): ExecutionFrame {
    for (let scope: Scope | null = this; scope !== null; scope = scope.parent) {
      if (scope.frame !== undefined) {
        return scope.frame;
      }
    }
    return { thisValue: undefined, thisInitialized: true };
  }

  /** Sibling scope carrying copies of this scope's own bindings (per-iteration `let`). */
  copy(): Scope {
    const next = new Scope(this.parent, this.kind, this.frame, this.onUnbound);
    for (const [name, binding] of this.bindings) {
      next.bindings.set(name, { value: binding.value, kind: binding.kind });
    }
    return next;
  }
}
