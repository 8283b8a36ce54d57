import { Capability } from './capability.js';
import {
  ContainerNode,
  isDeclarationNode,
  type DeclarationNode,
  type QuestNode,
  type RequirementNode,
} from './declaration-nodes.js';
import type { ContainerDocument, ExtractionDocument, JsonObject, JsonValue } from './schemas-document.js';

const REQUIREMENT_BOOKKEEPING: ReadonlySet<string> = new Set([
  'family',
  'type',
  'requiredValue',
  'comparisonMode',
  'fields',
]);

const QUEST_BOOKKEEPING: ReadonlySet<string> = new Set([
  'family',
  'type',
  'amount',
  'pointsReward',
  'fields',
  'description',
  'ordinalIndex',
  'memberOfContainer',
  'customReward',
  'optionalArgs',
]);

const POKEMON_BOOKKEEPING: ReadonlySet<string> = new Set(['family', 'type', 'fields', 'ordinalIndex', 'memberOfContainer']);

export const CIRCULAR_REFERENCE = '[circular]';

/** Presence flag that stands in for a function-valued field (`reward` becomes `hasReward`). */
export const callbackFlagName = (key: string): string => `has${key.charAt(0).toUpperCase()}${key.slice(1)}`;

const ownEntries = (value: object, skip: ReadonlySet<string>): [string, unknown][] =>
  Object.entries(value).filter(([key]) => !skip.has(key));

/**
 * Walks an object graph built by extracted code and returns its JSON form.
 * Declaration nodes dispatch on their family tag; everything else is copied
 * structurally. Values with no JSON form (`undefined`, symbols) are dropped from
 * objects and become `null` inside arrays.
 */
export class GraphSerializer {
  private readonly active = new Set<object>();

  toDocument(instance: unknown): JsonValue {
    return this.value(instance) ?? null;
  }

  container(container: ContainerNode): ContainerDocument {
    const record = container.toRecord();
    const unlock = record.unlockRequirement;
    return {
      name: record.name,
      description: this.value(record.description) ?? '',
      unlockRequirement: unlock === null ? null : this.requirement(unlock),
      flags: this.fieldsOf(Object.entries(record.flags)),
      children: this.array(record.children),
    };
  }

  containers(containers: readonly ContainerNode[]): ExtractionDocument {
    return containers.map((container) => this.container(container));
  }

  private value(value: unknown): JsonValue | undefined {
    if (value === null || typeof value === 'boolean' || typeof value === 'string') {
      return value;
    }
    if (typeof value === 'number') {
      return Number.isFinite(value) ? value : null;
    }
    if (typeof value === 'bigint') {
      return value.toString();
    }
    if (value instanceof Capability) {
      return { ref: value.path };
    }
    if (value === undefined || typeof value === 'symbol' || typeof value === 'function') {
      return undefined;
    }
    if (value instanceof ContainerNode) {
      return { ref: value.name };
    }
    return this.guarded(value, () => this.object(value));
  }

  private guarded(value: object, serialize: () => JsonValue): JsonValue {
    if (this.active.has(value)) {
      return { ref: CIRCULAR_REFERENCE };
    }
    this.active.add(value);
    try {
      return serialize();
    } finally {
      this.active.delete(value);
    }
  }

  private object(value: object): JsonValue {
    if (isDeclarationNode(value)) {
      switch (value.family) {
        case 'requirement':
          return this.requirement(value);
        case 'quest':
          return this.quest(value);
        case 'pokemon':
          return this.node(value, value.fields, POKEMON_BOOKKEEPING);
      }
    }
    if (Array.isArray(value)) {
      return this.array(value);
    }
    if (value instanceof Set) {
      return this.array([...value]);
    }
    if (value instanceof Map) {
      return this.fieldsOf([...value.entries()].map(([key, entry]): [string, unknown] => [String(key), entry]));
    }
    if (value instanceof Date) {
      return value.toISOString();
    }
    return this.fieldsOf(Object.entries(value));
  }

  private array(values: readonly unknown[]): JsonValue[] {
    return Array.from(values, (entry) => this.value(entry) ?? null);
  }

  private fieldsOf(entries: Iterable<[string, unknown]>, target: JsonObject = {}): JsonObject {
    for (const [key, entry] of entries) {
      if (typeof entry === 'function' && !(entry instanceof Capability)) {
        target[callbackFlagName(key)] = true;
        continue;
      }
      const serialized = this.value(entry);
      if (serialized !== undefined) {
        target[key] = serialized;
      }
    }
    return target;
  }

  private node(node: DeclarationNode, fields: Readonly<Record<string, unknown>>, bookkeeping: ReadonlySet<string>): JsonObject {
    const document: JsonObject = { type: node.type };
    this.fieldsOf(Object.entries(fields), document);
    return this.fieldsOf(ownEntries(node, bookkeeping), document);
  }

  private requirement(requirement: RequirementNode): JsonObject {
    const document = this.node(requirement, requirement.fields, REQUIREMENT_BOOKKEEPING);
    if (requirement.comparisonMode !== 'more') {
      document.comparisonMode = requirement.comparisonMode;
    }
    return document;
  }

  private quest(quest: QuestNode): JsonObject {
    const document: JsonObject = { type: quest.type };
    this.fieldsOf(
      [
        ['description', quest.description],
        ['amount', quest.amount],
        ['pointsReward', quest.pointsReward],
      ],
      document,
    );
    this.fieldsOf(Object.entries(quest.fields), document);
    this.fieldsOf(ownEntries(quest, QUEST_BOOKKEEPING), document);
    return this.fieldsOf(
      [
        ['optionalArgs', quest.optionalArgs],
        ['customReward', quest.customReward],
      ],
      document,
    );
  }
}

export function serializeContainers(containers: readonly ContainerNode[]): ExtractionDocument {
  return new GraphSerializer().containers(containers);
}

export function toDocument(instance: unknown): JsonValue {
  return new GraphSerializer().toDocument(instance);
}
