import type { FieldMap, LookupTables, RequirementInit } from './declaration-nodes.js';
import {
  argumentAt,
  comparisonModeOf,
  countOf,
  listOf,
  positionalFields,
  tableName,
} from './variant-arguments.js';

export interface RequirementVariantDefinition {
  readonly type: string;
  build(args: readonly unknown[], tables: LookupTables): RequirementInit;
}

const requirement = (
  requiredValue: number,
  option: unknown,
  fields: FieldMap,
  tables: LookupTables,
): RequirementInit => ({
  requiredValue,
  comparisonMode: comparisonModeOf(option, tables),
  fields,
});

const REQUIREMENT_VARIANTS: readonly RequirementVariantDefinition[] = [
  {
    type: 'Requirement',
    build: (args, tables) => requirement(countOf(argumentAt(args, 0, 1), 1), args[1], {}, tables),
  },
  {
    type: 'RouteKillRequirement',
    build: ([kills, region, route, option], tables) =>
      requirement(countOf(kills, 1), option, { kills, region: tableName(tables.region, region), route }, tables),
  },
  {
    type: 'GymBadgeRequirement',
    build: ([badge, option], tables) => requirement(1, option, { badge }, tables),
  },
  {
    type: 'ClearDungeonRequirement',
    build: ([clears, dungeon, option], tables) => requirement(countOf(clears, 1), option, { clears, dungeon }, tables),
  },
  {
    type: 'TemporaryBattleRequirement',
    build: (args, tables) => {
      const defeats = argumentAt(args, 1, 1);
      return requirement(countOf(defeats, 1), args[2], { battle: args[0], defeats }, tables);
    },
  },
  {
    type: 'QuestLineCompletedRequirement',
    build: ([questLine, option], tables) => requirement(1, option, { questLine }, tables),
  },
  {
    type: 'QuestLineStepCompletedRequirement',
    build: ([questLine, step, option], tables) => requirement(1, option, { questLine, step }, tables),
  },
  {
    type: 'QuestLineStartedRequirement',
    build: ([questLine, option], tables) => requirement(1, option, { questLine }, tables),
  },
  {
    type: 'ObtainedPokemonRequirement',
    build: ([pokemon, notObtained], tables) =>
      requirement(1, undefined, notObtained === true ? { pokemon, notObtained: true } : { pokemon }, tables),
  },
  {
    type: 'CaughtPokemonRequirement',
    build: ([pokemon], tables) => requirement(1, undefined, { pokemon }, tables),
  },
  {
    type: 'MultiRequirement',
    build: ([requirements], tables) => {
      const list = listOf(requirements);
      return requirement(list.length, undefined, { requirements: list }, tables);
    },
  },
  {
    type: 'OneFromManyRequirement',
    build: ([requirements], tables) => requirement(1, undefined, { requirements: listOf(requirements) }, tables),
  },
  {
    type: 'NullRequirement',
    build: (_args, tables) => requirement(0, undefined, {}, tables),
  },
  {
    type: 'SpecialEventRequirement',
    build: ([event], tables) => requirement(1, undefined, { event }, tables),
  },
  {
    type: 'ItemOwnedRequirement',
    build: (args, tables) => {
      const amount = argumentAt(args, 1, 1);
      return requirement(countOf(amount, 1), args[2], { item: args[0], amount }, tables);
    },
  },
  {
    type: 'StarterRequirement',
    build: ([region, starter], tables) =>
      requirement(
        1,
        undefined,
        { region: tableName(tables.region, region), starter: tableName(tables.starter, starter) },
        tables,
      ),
  },
  {
    type: 'StatisticRequirement',
    build: ([stat, value, hint, option], tables) => requirement(countOf(value, 1), option, { stat, value, hint }, tables),
  },
  {
    type: 'MaxRegionRequirement',
    build: ([region, option], tables) =>
      requirement(countOf(region, 1), option, { region: tableName(tables.region, region) }, tables),
  },
  {
    type: 'ClearGymRequirement',
    build: ([clears, gym, option], tables) => requirement(countOf(clears, 1), option, { clears, gym }, tables),
  },
  {
    type: 'WeatherRequirement',
    build: ([weathers, regionNum], tables) => requirement(1, undefined, { weathers, regionNum }, tables),
  },
  {
    type: 'DevelopmentRequirement',
    build: (_args, tables) => requirement(1, undefined, {}, tables),
  },
  {
    type: 'InRegionRequirement',
    build: ([region], tables) => requirement(1, undefined, { region: tableName(tables.region, region) }, tables),
  },
];

export const REQUIREMENT_VARIANT_CATALOG: ReadonlyMap<string, RequirementVariantDefinition> = new Map(
  REQUIREMENT_VARIANTS.map((definition) => [definition.type, definition]),
);

/** Shape for a requirement name with no typed model: constructor arguments kept positionally. */
export function genericRequirementVariant(type: string): RequirementVariantDefinition {
  return {
    type,
    build: (args, tables) => requirement(1, undefined, positionalFields(args), tables),
  };
}
