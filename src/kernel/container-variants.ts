import {
  ContainerNode,
  PokemonNode,
  QuestNode,
  RequirementNode,
  type ContainerRecord,
  type LookupTables,
} from './declaration-nodes.js';
import { argumentAt, listOf } from './variant-arguments.js';

export type ContainerKind = 'QuestLine' | 'TemporaryBattle';

export type ChildKind = 'GymPokemon';

export type ContainerBindingKind = ContainerKind | ChildKind;

export interface ContainerContext {
  readonly tables: LookupTables;
  collect(container: ContainerNode): void;
  requirement(type: string, args: readonly unknown[]): RequirementNode;
  quest(type: string, args: readonly unknown[]): QuestNode;
}

const textOf = (value: unknown): string => (typeof value === 'string' ? value : value === undefined ? '' : String(value));

const DISPLAY_NAME_SUFFIX = /( route)? \d+$/;

export class QuestLineNode extends ContainerNode {
  readonly description: unknown;
  readonly requirement: unknown;
  readonly bulletinBoard: unknown;
  readonly disablePausing: boolean;
  private readonly tables: LookupTables;
  private readonly context: ContainerContext;

  constructor(args: readonly unknown[], context: ContainerContext) {
    super('QuestLine', textOf(args[0]));
    this.description = args[1];
    this.requirement = args[2];
    this.bulletinBoard = argumentAt(args, 3, 0);
    this.disablePausing = args[4] === true;
    this.tables = context.tables;
    this.context = context;
    context.collect(this);
  }

  get totalQuests(): number {
    return this.children.length;
  }

  /** Objects, guest class instances included, are kept as given; only a primitive is wrapped as a described quest. */
  addQuest(quest: unknown): void {
    if (typeof quest === 'object' && quest !== null) {
      this.appendChild(quest);
      return;
    }
    this.appendChild(this.context.quest('Quest', []).withDescription(String(quest)));
  }

  quests(): readonly unknown[] {
    return this.children;
  }

  toRecord(): ContainerRecord {
    const bulletinBoard =
      typeof this.bulletinBoard === 'number' ? this.tables.bulletinBoard[this.bulletinBoard] ?? 'None' : 'None';
    return {
      type: this.type,
      name: this.name,
      description: this.description,
      unlockRequirement: this.requirement instanceof RequirementNode ? this.requirement : null,
      flags: {
        bulletinBoard,
        ...(this.disablePausing ? { disablePausing: true } : {}),
        totalQuests: this.totalQuests,
      },
      children: this.children,
    };
  }
}

export class TemporaryBattleNode extends ContainerNode {
  readonly pokemons: readonly unknown[];
  readonly defeatMessage: unknown;
  readonly requirements: unknown[];
  readonly completeRequirements: unknown[];
  readonly optionalArgs: Record<string, unknown>;
  private readonly context: ContainerContext;

  constructor(args: readonly unknown[], context: ContainerContext) {
    super('TemporaryBattle', textOf(args[0]));
    this.pokemons = listOf(args[1]);
    this.defeatMessage = args[2];
    this.requirements = [...listOf(args[3])];
    this.completeRequirements =
      args[4] === undefined ? [context.requirement('TemporaryBattleRequirement', [args[0]])] : [...listOf(args[4])];
    this.optionalArgs = isRecord(args[5]) ? args[5] : {};
    if (this.optionalArgs.isTrainerBattle === undefined) {
      this.optionalArgs.isTrainerBattle = true;
    }
    this.context = context;
    for (const pokemon of this.pokemons) {
      this.appendChild(pokemon);
    }
    context.collect(this);
  }

  getDisplayName(): string {
    const explicit = this.optionalArgs.displayName;
    return typeof explicit === 'string' ? explicit : this.name.replace(DISPLAY_NAME_SUFFIX, '');
  }

  getPokemonList(): readonly unknown[] {
    return this.pokemons;
  }

  toRecord(): ContainerRecord {
    const { displayName: _displayName, isTrainerBattle, ...rest } = this.optionalArgs;
    return {
      type: this.type,
      name: this.name,
      description: this.defeatMessage,
      unlockRequirement: this.unlockRequirement(),
      flags: {
        displayName: this.getDisplayName(),
        ...rest,
        isTrainerBattle,
        completeRequirements: this.completeRequirements,
      },
      children: this.children,
    };
  }

  private unlockRequirement(): RequirementNode | null {
    const requirements = this.requirements.filter((entry): entry is RequirementNode => entry instanceof RequirementNode);
    if (requirements.length === 0) {
      return null;
    }
    if (requirements.length === 1) {
      return requirements[0] ?? null;
    }
    return this.context.requirement('MultiRequirement', [requirements]);
  }
}

export class GymPokemonNode extends PokemonNode {
  constructor(args: readonly unknown[]) {
    const [name, health, level, requirement, shiny] = args;
    super('GymPokemon', {
      name,
      health,
      level,
      ...(requirement !== undefined && requirement !== null ? { requirement } : {}),
      ...(shiny === true ? { shiny: true } : {}),
    });
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
