import {
  GymPokemonNode,
  QuestLineNode,
  TemporaryBattleNode,
  type ContainerBindingKind,
  type ContainerContext,
} from './container-variants.js';
import { QuestNode, RequirementNode, type ContainerNode, type LookupTables } from './declaration-nodes.js';
import { configInvalidError } from './extraction-error.js';
import { QUEST_VARIANT_CATALOG, genericQuestVariant, type QuestVariantDefinition } from './quest-variants.js';
import {
  REQUIREMENT_VARIANT_CATALOG,
  genericRequirementVariant,
  type RequirementVariantDefinition,
} from './requirement-variants.js';

export interface VariantNameLists {
  readonly typed: readonly string[];
  readonly generic: readonly string[];
}

export interface VariantSuffixes {
  readonly requirement: string;
  readonly quest: string;
}

export interface DeclarationRegistryOptions {
  readonly tables: LookupTables;
  readonly requirements: VariantNameLists;
  readonly quests: VariantNameLists;
  readonly suffixes: VariantSuffixes;
  readonly containers: readonly ContainerBindingKind[];
  readonly collect: (container: ContainerNode) => void;
}

type VariantConstructor<T> = new (...args: unknown[]) => T;

export interface DeclarationRegistry {
  /** Constructors to bind in the global scope, keyed by the name source code uses. */
  readonly bindings: ReadonlyMap<string, Function>;
  /** Generic constructor for a name that ends with a recognised variant suffix. */
  structuralMatch(name: string): Function | undefined;
  /** Member answered for a key the receiver does not define; `undefined` when none applies. */
  missingMember(target: object, key: string): unknown;
  requirement(type: string, args: readonly unknown[]): RequirementNode;
  quest(type: string, args: readonly unknown[]): QuestNode;
}

/** Guest subclasses keep their own class name as the discriminator. */
const variantType = (target: Function, fallback: string): string => (target.name === '' ? fallback : target.name);

function requirementVariantClass(
  definition: RequirementVariantDefinition,
  tables: LookupTables,
): VariantConstructor<RequirementNode> {
  const variant = class extends RequirementNode {
    constructor(...args: unknown[]) {
      super(variantType(new.target, definition.type), definition.build(args, tables));
    }
  };
  Object.defineProperty(variant, 'name', { value: definition.type });
  return variant;
}

function questVariantClass(definition: QuestVariantDefinition, tables: LookupTables): VariantConstructor<QuestNode> {
  const variant = class extends QuestNode {
    constructor(...args: unknown[]) {
      super(variantType(new.target, definition.type), definition.build(args, tables));
    }
  };
  Object.defineProperty(variant, 'name', { value: definition.type });
  return variant;
}

function returnReceiver(this: unknown): unknown {
  return this;
}

export function createDeclarationRegistry(options: DeclarationRegistryOptions): DeclarationRegistry {
  const { tables } = options;
  const requirementClasses = new Map<string, VariantConstructor<RequirementNode>>();
  const questClasses = new Map<string, VariantConstructor<QuestNode>>();
  const bindings = new Map<string, Function>();

  const typedRequirements = new Set(options.requirements.typed);
  const typedQuests = new Set(options.quests.typed);
  const genericRequirements = new Set(options.requirements.generic);
  const genericQuests = new Set(options.quests.generic);

  // Only names the domain lists as typed take the catalog model; every other name keeps positional fields.
  const requirementClass = (type: string): VariantConstructor<RequirementNode> => {
    let variant = requirementClasses.get(type);
    if (variant === undefined) {
      const definition = typedRequirements.has(type) ? REQUIREMENT_VARIANT_CATALOG.get(type) : undefined;
      variant = requirementVariantClass(definition ?? genericRequirementVariant(type), tables);
      requirementClasses.set(type, variant);
    }
    return variant;
  };

  const questClass = (type: string): VariantConstructor<QuestNode> => {
    let variant = questClasses.get(type);
    if (variant === undefined) {
      const definition = typedQuests.has(type) ? QUEST_VARIANT_CATALOG.get(type) : undefined;
      variant = questVariantClass(definition ?? genericQuestVariant(type), tables);
      questClasses.set(type, variant);
    }
    return variant;
  };

  // Containers build their implied requirements and wrapped quests with the catalog model whether or not the
  // domain lists the name, unless the domain lists it as generic.
  const composedRequirementClasses = new Map<string, VariantConstructor<RequirementNode>>();
  const composedQuestClasses = new Map<string, VariantConstructor<QuestNode>>();

  const composedRequirement = (type: string, args: readonly unknown[]): RequirementNode => {
    const definition = REQUIREMENT_VARIANT_CATALOG.get(type);
    if (definition === undefined || typedRequirements.has(type) || genericRequirements.has(type)) {
      return new (requirementClass(type))(...args);
    }
    let variant = composedRequirementClasses.get(type);
    if (variant === undefined) {
      variant = requirementVariantClass(definition, tables);
      composedRequirementClasses.set(type, variant);
    }
    return new variant(...args);
  };

  const composedQuest = (type: string, args: readonly unknown[]): QuestNode => {
    const definition = QUEST_VARIANT_CATALOG.get(type);
    if (definition === undefined || typedQuests.has(type) || genericQuests.has(type)) {
      return new (questClass(type))(...args);
    }
    let variant = composedQuestClasses.get(type);
    if (variant === undefined) {
      variant = questVariantClass(definition, tables);
      composedQuestClasses.set(type, variant);
    }
    return new variant(...args);
  };

  const unmodelled = [
    ...options.requirements.typed.filter((type) => !REQUIREMENT_VARIANT_CATALOG.has(type)),
    ...options.quests.typed.filter((type) => !QUEST_VARIANT_CATALOG.has(type)),
  ];
  if (unmodelled.length > 0) {
    throw configInvalidError(`Typed variant names without a model: ${unmodelled.join(', ')}.`, {
      issues: unmodelled.map((type) => `variants: '${type}' is not a modelled variant; list it as generic`),
    });
  }

  for (const type of options.requirements.typed) {
    bindings.set(type, requirementClass(type));
  }
  for (const type of options.requirements.generic) {
    const variant = requirementVariantClass(genericRequirementVariant(type), tables);
    requirementClasses.set(type, variant);
    bindings.set(type, variant);
  }
  for (const type of options.quests.typed) {
    bindings.set(type, questClass(type));
  }
  for (const type of options.quests.generic) {
    const variant = questVariantClass(genericQuestVariant(type), tables);
    questClasses.set(type, variant);
    bindings.set(type, variant);
  }

  const registry: DeclarationRegistry = {
    bindings,
    structuralMatch(name) {
      if (name.endsWith(options.suffixes.requirement)) {
        return requirementClass(name);
      }
      if (name.endsWith(options.suffixes.quest)) {
        return questClass(name);
      }
      return undefined;
    },
    missingMember(target, key) {
      return target instanceof QuestNode && key.startsWith('with') ? returnReceiver : undefined;
    },
    requirement: (type, args) => new (requirementClass(type))(...args),
    quest: (type, args) => new (questClass(type))(...args),
  };

  const context: ContainerContext = {
    tables,
    collect: options.collect,
    requirement: composedRequirement,
    quest: composedQuest,
  };

  for (const kind of options.containers) {
    bindings.set(kind, containerClass(kind, context));
  }

  return registry;
}

function containerClass(kind: ContainerBindingKind, context: ContainerContext): Function {
  switch (kind) {
    case 'QuestLine':
      return class QuestLine extends QuestLineNode {
        constructor(...args: unknown[]) {
          super(args, context);
        }
      };
    case 'TemporaryBattle':
      return class TemporaryBattle extends TemporaryBattleNode {
        constructor(...args: unknown[]) {
          super(args, context);
        }
      };
    case 'GymPokemon':
      return class GymPokemon extends GymPokemonNode {
        constructor(...args: unknown[]) {
          super(args);
        }
      };
  }
}
