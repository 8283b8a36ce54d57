import { Capability } from './capability.js';
import type { BindingScope } from './scope.js';

export interface NamedReference {
  readonly name: string;
}

export interface CapabilityResolver {
  resolve(scope: BindingScope, name: string): unknown;
}

export interface CapabilityResolverOptions {
  readonly placeholder: unknown;
  /** Display names keyed by declaration identifier; read on first miss only. */
  readonly nameBindings?: () => ReadonlyMap<string, string>;
  /** Base constructor for names that structurally look like a declaration variant. */
  readonly structuralMatch?: (name: string) => Function | undefined;
}

export function createCapabilityResolver(options: CapabilityResolverOptions): CapabilityResolver {
  let nameBindings: ReadonlyMap<string, string> | undefined;
  const displayNameOf = (name: string): string | undefined => {
    nameBindings ??= options.nameBindings?.() ?? new Map<string, string>();
    return nameBindings.get(name);
  };

  return {
    resolve(scope, name) {
      if (scope.has(name)) {
        return scope.get(name);
      }

      const displayName = displayNameOf(name);
      if (displayName !== undefined) {
        const reference: NamedReference = Object.freeze({ name: displayName });
        scope.declare(name, reference, 'ambient');
        return reference;
      }

      const variant = options.structuralMatch?.(name);
      if (variant !== undefined) {
        scope.declare(name, variant, 'ambient');
        return variant;
      }

      const capability = new Capability(name, { placeholder: options.placeholder });
      scope.declare(name, capability, 'ambient');
      return capability;
    },
  };
}
