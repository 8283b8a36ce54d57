import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { formatDocument } from '../../../src/harness/run-extraction.js';
import { isExtractionError } from '../../../src/kernel/extraction-error.js';
import { makeSettings, runFixture } from '../../helpers/extraction-helpers.js';

const ROUTE_LINE = `
class QuestLineHelper {
  public static createRouteQuestLine(): void {
    const line = new QuestLine('Route Line', 'Walk the routes', new RouteKillRequirement(5, GameConstants.Region.kanto, 3));
    line.addQuest(new DefeatPokemonsQuest(10, 0, 3, GameConstants.Region.kanto));
    App.game.quests.questLines().push(line);
  }
}
`;

const THREE_LINES = `
class Lines {
  static createA() {
    new QuestLine('A', 'first');
  }

  static createB() {
    new QuestLine('B', 'second');
    throw new Error('boom');
  }

  static createC() {
    new QuestLine('C', 'third');
  }
}
`;

describe('extractDeclarations', () => {
  it('serializes a quest line with its typed unlock requirement and quest', () => {
    const { result } = runFixture(ROUTE_LINE);

    assert.deepEqual(result.document, [
      {
        name: 'Route Line',
        description: 'Walk the routes',
        unlockRequirement: { type: 'RouteKillRequirement', kills: 5, region: 'kanto', route: 3 },
        flags: { bulletinBoard: 'None', totalQuests: 1 },
        children: [
          {
            type: 'DefeatPokemonsQuest',
            description: '',
            amount: 10,
            pointsReward: 0,
            route: 3,
            region: 'kanto',
          },
        ],
      },
    ]);
  });

  it('emits requirement keys in type-then-declaration order', () => {
    const { result } = runFixture(ROUTE_LINE);
    const unlock = result.document[0]?.unlockRequirement;
    assert.deepEqual(Object.keys(unlock ?? {}), ['type', 'kills', 'region', 'route']);
  });

  it('keeps discovery order and drops the container of a failing entry point', () => {
    const { result, records } = runFixture(THREE_LINES);

    assert.deepEqual(
      result.document.map((container) => container.name),
      ['A', 'C'],
    );
    assert.deepEqual(result.report.entryPoints, [
      { unit: 'Lines.createA', ok: true, containers: 1 },
      { unit: 'Lines.createB', ok: false, containers: 0, message: 'boom' },
      { unit: 'Lines.createC', ok: true, containers: 1 },
    ]);
    assert.deepEqual(result.report.diagnostics, [
      {
        code: 'ENTRY_POINT_EXECUTION_FAILED',
        path: 'Lines.createB',
        severity: 'warning',
        message: 'GUEST_THROW: boom',
      },
    ]);
    assert.deepEqual(
      records.filter((record) => record.level === 'warn'),
      [{ scope: 'TEST', level: 'warn', message: 'Lines.createB failed: boom (1 container(s) discarded)' }],
    );
  });

  it('produces byte-identical documents on repeated runs', () => {
    const first = formatDocument(runFixture(ROUTE_LINE).result.document);
    const second = formatDocument(runFixture(ROUTE_LINE).result.document);
    assert.equal(first, second);
  });

  it('flags a custom reward callback without serializing the function', () => {
    const { result } = runFixture(`
      function createRewardLine() {
        const line = new QuestLine('Reward', 'Get paid', new Requirement(3));
        line.addQuest(new CapturePokemonsQuest(4, 2).withCustomReward(() => {}).withDescription('Catch four'));
      }
    `);

    assert.deepEqual(result.document[0]?.unlockRequirement, { type: 'Requirement' });
    assert.deepEqual(result.document[0]?.children, [
      { type: 'CapturePokemonsQuest', description: 'Catch four', amount: 4, pointsReward: 2, hasCustomReward: true },
    ]);
  });

  it('writes comparisonMode only when it is not the default', () => {
    const { result } = runFixture(`
      function createModes() {
        new QuestLine('Less', '', new Requirement(2, GameConstants.AchievementOption.less));
        new QuestLine('More', '', new Requirement(2, GameConstants.AchievementOption.more));
      }
    `);

    assert.deepEqual(result.document[0]?.unlockRequirement, { type: 'Requirement', comparisonMode: 'less' });
    assert.deepEqual(result.document[1]?.unlockRequirement, { type: 'Requirement' });
  });

  it('keeps positional arguments of unmodelled requirement variants', () => {
    const { result } = runFixture(`
      function createMystery() {
        new QuestLine('Mystery', 'Unknown', new MysteryRequirement(3, 'x'));
        new QuestLine('Money', 'Pay up', new MoneyRequirement(500));
      }
    `);

    assert.deepEqual(result.document[0]?.unlockRequirement, { type: 'MysteryRequirement', arg0: 3, arg1: 'x' });
    assert.deepEqual(result.document[1]?.unlockRequirement, { type: 'MoneyRequirement', arg0: 500 });
  });

  it('resolves names declared in the companion source and wraps plain quests', () => {
    const { result } = runFixture(
      `
      class Helper {
        static createTalk() {
          const line = new QuestLine('Talk', 'Chat');
          line.addQuest(new TalkToNPCQuest(ProfOak, 'Talk to Oak'));
          line.addQuest('Just text');
        }
      }
    `,
      { companion: `const ProfOak = new ProfNPC('Professor Oak', ['Hello']);\nconst Nurse = new Unlisted('Joy');\n` },
    );

    assert.deepEqual(result.document[0]?.children, [
      { type: 'TalkToNPCQuest', description: 'Talk to Oak', amount: 1, pointsReward: 0, npcName: 'Professor Oak' },
      { type: 'Quest', description: 'Just text', amount: 1, pointsReward: 0 },
    ]);
    assert.deepEqual(result.document[0]?.flags, { bulletinBoard: 'None', totalQuests: 2 });
  });

  it('serializes temporary battles with their children and flags', () => {
    const { result } = runFixture(`
      const TemporaryBattleList: { [name: string]: TemporaryBattle } = {};
      TemporaryBattleList['Rival 1'] = new TemporaryBattle(
        'Rival 1',
        [new GymPokemon('Squirtle', 100, 5), new GymPokemon('Pidgey', 80, 4, new GymBadgeRequirement(BadgeEnums.Boulder))],
        'You won!',
        [new RouteKillRequirement(10, GameConstants.Region.kanto, 22)],
        undefined,
        { isTrainerBattle: false, rewardFunction: () => {} },
      );
    `);

    assert.deepEqual(result.document, [
      {
        name: 'Rival 1',
        description: 'You won!',
        unlockRequirement: { type: 'RouteKillRequirement', kills: 10, region: 'kanto', route: 22 },
        flags: {
          displayName: 'Rival',
          hasRewardFunction: true,
          isTrainerBattle: false,
          completeRequirements: [{ type: 'TemporaryBattleRequirement', battle: 'Rival 1', defeats: 1 }],
        },
        children: [
          { type: 'GymPokemon', name: 'Squirtle', health: 100, level: 5 },
          {
            type: 'GymPokemon',
            name: 'Pidgey',
            health: 80,
            level: 4,
            requirement: { type: 'GymBadgeRequirement', badge: 'Boulder' },
          },
        ],
      },
    ]);
    assert.deepEqual(result.report.summary, { containers: 1, children: 2, childrenWithRequirement: 1 });
  });

  it('combines several battle requirements into one MultiRequirement', () => {
    const { result } = runFixture(`
      new TemporaryBattle('Route 3 Trainer', [], 'Done', [new Requirement(1), new GymBadgeRequirement('Cascade')]);
    `);

    assert.deepEqual(result.document[0]?.unlockRequirement, {
      type: 'MultiRequirement',
      requirements: [{ type: 'Requirement' }, { type: 'GymBadgeRequirement', badge: 'Cascade' }],
    });
    assert.equal(result.document[0]?.flags.displayName, 'Route 3 Trainer');
    assert.equal(result.document[0]?.flags.isTrainerBattle, true);
  });

  it('keeps the class name of guest subclasses of requirement variants', () => {
    const { result } = runFixture(`
      class SeasonalRequirement extends Requirement {
        constructor() {
          super(4);
        }
      }
      new QuestLine('Seasonal', undefined, new SeasonalRequirement());
    `);

    assert.deepEqual(result.document, [
      {
        name: 'Seasonal',
        description: '',
        unlockRequirement: { type: 'SeasonalRequirement' },
        flags: { bulletinBoard: 'None', totalQuests: 0 },
        children: [],
      },
    ]);
  });

  it('lets built-ins call capabilities passed as callbacks', () => {
    const { result } = runFixture(`
      class Helper {
        static createLine() {
          const line = new QuestLine('Merged', 'Texts');
          ['a', 'b'].map(TextMerger.mergeText).forEach((text) => line.addQuest(text));
        }
      }
    `);

    assert.deepEqual(result.report.entryPoints, [{ unit: 'Helper.createLine', ok: true, containers: 1 }]);
    assert.deepEqual(result.document[0]?.children, [
      { type: 'Quest', description: 'a', amount: 1, pointsReward: 0 },
      { type: 'Quest', description: 'b', amount: 1, pointsReward: 0 },
    ]);
  });

  it('gives positional fields to catalog names the domain does not list as typed', () => {
    const settings = makeSettings({
      variants: {
        requirements: { typed: [], generic: [] },
        quests: { typed: ['Quest'], generic: [] },
        suffixes: { requirement: 'Requirement', quest: 'Quest' },
      },
    });
    const { result } = runFixture(
      `
      new QuestLine('Plain', '', new RouteKillRequirement(5, GameConstants.Region.kanto, 3));
      new TemporaryBattle('Gym', [], 'Won');
    `,
      { settings },
    );

    assert.deepEqual(result.document[0]?.unlockRequirement, {
      type: 'RouteKillRequirement',
      arg0: 5,
      arg1: 0,
      arg2: 3,
    });
    assert.deepEqual(result.document[1]?.flags.completeRequirements, [
      { type: 'TemporaryBattleRequirement', battle: 'Gym', defeats: 1 },
    ]);
  });

  it('keeps one container per name, holding the latest declaration', () => {
    const { result } = runFixture(`
      const TemporaryBattleList: { [name: string]: TemporaryBattle } = {};
      TemporaryBattleList['Blue'] = new TemporaryBattle('Blue', [], 'first');
      TemporaryBattleList['Red'] = new TemporaryBattle('Red', [], 'other');
      TemporaryBattleList['Blue'] = new TemporaryBattle('Blue', [], 'second');
    `);

    assert.deepEqual(
      result.document.map((container) => [container.name, container.description]),
      [
        ['Blue', 'second'],
        ['Red', 'other'],
      ],
    );
    assert.deepEqual(result.report.diagnostics, [
      {
        code: 'CONTAINER_REPLACED',
        path: 'Blue',
        severity: 'warning',
        message: "Container 'Blue' was declared again; the later declaration replaces the earlier one.",
      },
    ]);
  });

  it('keeps object quests as given and serializes their own fields', () => {
    const { result } = runFixture(`
      class FishingQuest {
        constructor(amount) {
          this.description = 'Cast a line';
          this.amount = amount;
        }
      }
      function createFishing() {
        const line = new QuestLine('Fishing', '');
        line.addQuest(new FishingQuest(3));
      }
    `);

    assert.deepEqual(result.document[0]?.children, [{ description: 'Cast a line', amount: 3 }]);
    assert.deepEqual(result.document[0]?.flags, { bulletinBoard: 'None', totalQuests: 1 });
  });

  it('isolates a failing top-level statement', () => {
    const { result } = runFixture(`
      new QuestLine('Before', 'kept');
      const empty: any = null;
      empty.value;
      new QuestLine('After', 'kept');
    `);

    assert.deepEqual(
      result.document.map((container) => container.name),
      ['Before', 'After'],
    );
    const failed = result.report.statements.filter((outcome) => !outcome.ok);
    assert.equal(failed.length, 1);
    assert.equal(failed[0]?.message, "Cannot read properties of null (reading 'value')");
    assert.equal(result.report.diagnostics[0]?.code, 'STATEMENT_EXECUTION_FAILED');
  });

  it('walks the run phases up to serialized', () => {
    const { result } = runFixture(ROUTE_LINE);
    assert.deepEqual(result.report.phases, ['idle', 'transpiling', 'executing', 'collected', 'serialized']);
  });

  it('rejects generator functions before executing anything', () => {
    assert.throws(
      () => runFixture('function* createMany() { yield 1; }'),
      (error: unknown) => isExtractionError(error) && error.code === 'SOURCE_UNSUPPORTED_SYNTAX',
    );
  });

  it('rejects typed variant names that have no model', () => {
    const settings = makeSettings({
      variants: {
        requirements: { typed: ['ImaginaryRequirement'], generic: [] },
        quests: { typed: [], generic: [] },
        suffixes: { requirement: 'Requirement', quest: 'Quest' },
      },
    });
    assert.throws(
      () => runFixture(ROUTE_LINE, { settings }),
      (error: unknown) => isExtractionError(error) && error.code === 'CONFIG_INVALID',
    );
  });
});
