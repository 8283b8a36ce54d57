export type ComparisonMode = 'less' | 'equal' | 'more';

export type NodeFamily = 'requirement' | 'quest' | 'pokemon';

export type FieldMap = Readonly<Record<string, unknown>>;

export interface LookupTables {
  readonly region: readonly string[];
  readonly starter: readonly string[];
  readonly bulletinBoard: readonly string[];
  readonly comparison: Readonly<Record<ComparisonMode, number>>;
}

export abstract class DeclarationNode {
  abstract readonly family: NodeFamily;

  protected constructor(readonly type: string) {}
}

export interface RequirementInit {
  readonly requiredValue: number;
  readonly comparisonMode: ComparisonMode;
  readonly fields: FieldMap;
}

export class RequirementNode extends DeclarationNode {
  readonly family = 'requirement';
  readonly requiredValue: number;
  readonly comparisonMode: ComparisonMode;
  readonly fields: FieldMap;

  constructor(type: string, init: RequirementInit) {
    super(type);
    this.requiredValue = init.requiredValue;
    this.comparisonMode = init.comparisonMode;
    this.fields = init.fields;
  }

  isCompleted(): boolean {
    return true;
  }
}

export interface QuestInit {
  readonly amount: unknown;
  readonly pointsReward: unknown;
  readonly description?: unknown;
  readonly fields: FieldMap;
}

/**
 * Builder methods mutate in place and return the receiver, so declaration
 * chains may apply them in any order and any number of times.
 */
export class QuestNode extends DeclarationNode {
  readonly family = 'quest';
  readonly amount: unknown;
  readonly pointsReward: unknown;
  readonly fields: FieldMap;
  description: unknown = '';
  ordinalIndex = 0;
  memberOfContainer = false;
  customReward?: unknown;
  optionalArgs?: unknown;

  constructor(type: string, init: QuestInit) {
    super(type);
    this.amount = init.amount;
    this.pointsReward = init.pointsReward;
    this.fields = init.fields;
    if (init.description !== undefined) {
      this.description = init.description;
    }
  }

  withDescription(description: unknown): this {
    this.description = description;
    return this;
  }

  withCustomReward(reward: unknown): this {
    this.customReward = reward;
    return this;
  }

  withOptionalArgs(optionalArgs: unknown): this {
    this.optionalArgs = optionalArgs;
    return this;
  }

  withInitialValue(): this {
    return this;
  }

  withOnLoad(): this {
    return this;
  }

  withFocus(): this {
    return this;
  }

  withIsRepeatable(): this {
    return this;
  }

  isCompleted(): boolean {
    return true;
  }
}

export class PokemonNode extends DeclarationNode {
  readonly family = 'pokemon';
  readonly fields: FieldMap;
  ordinalIndex = 0;
  memberOfContainer = false;

  constructor(type: string, fields: FieldMap) {
    super(type);
    this.fields = fields;
  }
}

export type ChildNode = QuestNode | PokemonNode;

/** Closed union of node variants, discriminated by `family`. */
export type TaggedNode = RequirementNode | QuestNode | PokemonNode;

export interface ContainerRecord {
  readonly type: string;
  readonly name: string;
  readonly description: unknown;
  readonly unlockRequirement: RequirementNode | null;
  readonly flags: FieldMap;
  readonly children: readonly unknown[];
}

export const isDeclarationNode = (value: unknown): value is TaggedNode => value instanceof DeclarationNode;

export const isChildNode = (value: unknown): value is ChildNode =>
  value instanceof QuestNode || value instanceof PokemonNode;

/** A named, ordered collection of children; records itself with the run's collector when constructed. */
export abstract class ContainerNode {
  readonly family = 'container';
  protected readonly entries: unknown[] = [];

  protected constructor(
    readonly type: string,
    readonly name: string,
  ) {}

  protected appendChild(child: unknown): void {
    this.entries.push(child);
    if (isChildNode(child)) {
      child.ordinalIndex = this.entries.length;
      child.memberOfContainer = true;
    }
  }

  get children(): readonly unknown[] {
    return this.entries;
  }

  abstract toRecord(): ContainerRecord;
}
