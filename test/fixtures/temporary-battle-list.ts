const TemporaryBattleList: { [battleName: string]: TemporaryBattle } = {};

TemporaryBattleList['Blue 1'] = new TemporaryBattle(
  'Blue 1',
  [new GymPokemon('Pidgey', 1040, 9), new GymPokemon('Charmander', 1040, 9)],
  '<i>Blue: What? Unbelievable!</i>',
  [new RouteKillRequirement(10, GameConstants.Region.kanto, 22)],
  undefined,
  { displayName: 'Rival Blue', imageName: 'Blue1' },
);

TemporaryBattleList['Fighting Dojo'] = new TemporaryBattle(
  'Fighting Dojo',
  [new GymPokemon('Hitmonlee', 5000, 30, new GymBadgeRequirement(BadgeEnums.Rainbow))],
  'Hwa! Arrgh! Beaten!',
  [
    new GymBadgeRequirement(BadgeEnums.Soul),
    new ClearDungeonRequirement(1, GameConstants.getDungeonIndex('Rocket Game Corner')),
  ],
  [new TemporaryBattleRequirement('Fighting Dojo', 2)],
  {
    isTrainerBattle: false,
    resetDaily: true,
    rewardFunction: () => {
      Notifier.notify({ message: 'You won the Fighting Dojo.' });
    },
  },
);

(TemporaryBattleList['Broken'] = new TemporaryBattle('Broken', [], 'Never')).getPokemonList().missing.length;
