import type { LookupTables, QuestInit } from './declaration-nodes.js';
import { argumentAt, listOf, positionalFields, referenceName, tableName } from './variant-arguments.js';

export interface QuestVariantDefinition {
  readonly type: string;
  build(args: readonly unknown[], tables: LookupTables): QuestInit;
}

const QUEST_VARIANTS: readonly QuestVariantDefinition[] = [
  {
    type: 'Quest',
    build: (args) => ({ amount: argumentAt(args, 0, 1), pointsReward: argumentAt(args, 1, 0), fields: {} }),
  },
  {
    type: 'CustomQuest',
    build: ([amount, pointsReward, description, progress]) => ({
      amount,
      pointsReward,
      description,
      fields: { progress },
    }),
  },
  {
    type: 'TalkToNPCQuest',
    build: (args) => ({
      amount: 1,
      pointsReward: argumentAt(args, 2, 0),
      description: args[1],
      fields: { npcName: referenceName(args[0], 'NPC') },
    }),
  },
  {
    type: 'DefeatPokemonsQuest',
    build: ([amount, pointsReward, route, region], tables) => ({
      amount,
      pointsReward,
      fields: { route, region: tableName(tables.region, region) },
    }),
  },
  {
    type: 'CapturePokemonsQuest',
    build: (args) => ({ amount: args[0], pointsReward: argumentAt(args, 1, 0), fields: {} }),
  },
  {
    type: 'CaptureSpecificPokemonQuest',
    build: (args) => ({
      amount: argumentAt(args, 1, 1),
      pointsReward: argumentAt(args, 3, 0),
      fields: { pokemon: args[0], shiny: argumentAt(args, 2, false) },
    }),
  },
  {
    type: 'DefeatDungeonQuest',
    build: ([amount, pointsReward, dungeon]) => ({ amount, pointsReward, fields: { dungeon } }),
  },
  {
    type: 'DefeatDungeonBossQuest',
    build: (args) => ({
      amount: 1,
      pointsReward: argumentAt(args, 2, 0),
      fields: { dungeon: args[0], boss: args[1] },
    }),
  },
  {
    type: 'DefeatGymQuest',
    build: ([amount, pointsReward, gym]) => ({ amount, pointsReward, fields: { gym } }),
  },
  {
    type: 'DefeatTemporaryBattleQuest',
    build: (args) => ({
      amount: 1,
      pointsReward: argumentAt(args, 2, 0),
      description: args[1],
      fields: { battle: args[0] },
    }),
  },
  {
    type: 'BuyPokeballsQuest',
    build: ([amount, pointsReward, pokeball]) => ({ amount, pointsReward, fields: { pokeball } }),
  },
  {
    type: 'HatchEggsQuest',
    build: ([amount, pointsReward]) => ({ amount, pointsReward, fields: {} }),
  },
  {
    type: 'MineLayersQuest',
    build: ([amount, pointsReward]) => ({ amount, pointsReward, fields: {} }),
  },
  {
    type: 'CapturePokemonTypesQuest',
    build: ([amount, pointsReward, pokemonType]) => ({ amount, pointsReward, fields: { pokemonType } }),
  },
  {
    type: 'MultipleQuestsQuest',
    build: (args) => {
      const quests = listOf(args[0]);
      return {
        amount: quests.length,
        pointsReward: argumentAt(args, 2, 0),
        description: args[1],
        fields: { quests },
      };
    },
  },
];

export const QUEST_VARIANT_CATALOG: ReadonlyMap<string, QuestVariantDefinition> = new Map(
  QUEST_VARIANTS.map((definition) => [definition.type, definition]),
);

export function genericQuestVariant(type: string): QuestVariantDefinition {
  return {
    type,
    build: (args) => ({ amount: 1, pointsReward: 0, fields: positionalFields(args) }),
  };
}
