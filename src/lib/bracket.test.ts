import { describe, it, expect } from 'vitest';
import { division, matchup, playoffDivision, team } from './__fixtures__/divisions.js';
import { bracketRoundsIn, buildBracket, seedTeams } from './bracket.js';
import { InsufficientDataError } from './errors.js';

describe('Playoff Brackets', () => {
  describe('seedTeams', () => {
    it('should order by standing when the provider reports one', () => {
      const teams = [
        team('East', 'Third', { standing: 3, wins: 9 }),
        team('East', 'First', { standing: 1, wins: 2 }),
        team('East', 'Second', { standing: 2 }),
      ];
      expect(seedTeams(teams).map(s => [s.seed, s.team.name])).toEqual([
        [1, 'First'],
        [2, 'Second'],
        [3, 'Third'],
      ]);
    });

    it('should fall back to wins, points for, then name', () => {
      const teams = [
        team('East', 'Zebras', { wins: 8, pointsFor: 1200 }),
        team('East', 'Antelopes', { wins: 8, pointsFor: 1200 }),
        team('East', 'Bison', { wins: 8, pointsFor: 1300.5 }),
        team('East', 'Cougars', { wins: 10, pointsFor: 900 }),
      ];
      expect(seedTeams(teams).map(s => s.team.name)).toEqual(['Cougars', 'Bison', 'Antelopes', 'Zebras']);
    });
  });

  describe('buildBracket', () => {
    it('should pair seeds 1v4 and 2v3 in the semifinal', () => {
      const bracket = buildBracket('Semifinal', playoffDivision('East'));
      expect(bracket.week).toBe(4);
      expect(bracket.matchups[0]).toEqual({
        matchupId: 'east_sf1',
        roundName: 'Semifinal 1',
        division: 'East',
        seed1: 1,
        team1: 'East Seed 1',
        owner1: 'East Seed 1 Owner',
        score1: 110,
        seed2: 4,
        team2: 'East Seed 4',
        owner2: 'East Seed 4 Owner',
        score2: 90,
        winner: 'East Seed 1',
        winnerSeed: 1,
      });
      expect(bracket.matchups[1]).toMatchObject({
        matchupId: 'east_sf2',
        seed1: 2,
        seed2: 3,
        winner: 'East Seed 3',
        winnerSeed: 3,
      });
    });

    it('should leave unplayed semifinals without a winner', () => {
      const bracket = buildBracket('Semifinal', playoffDivision('East', { semifinal: [null, null, 95, 100] }));
      expect(bracket.matchups[0]).toMatchObject({ score1: null, score2: null, winner: null, winnerSeed: null });
    });

    it('should pair the semifinal winners in the final', () => {
      const bracket = buildBracket('Final', playoffDivision('East', { final: [90, 95.5] }));
      expect(bracket.week).toBe(5);
      expect(bracket.matchups).toHaveLength(1);
      expect(bracket.matchups[0]).toMatchObject({
        matchupId: 'east_final',
        roundName: 'Final',
        team1: 'East Seed 1',
        team2: 'East Seed 3',
        score1: 90,
        score2: 95.5,
        winner: 'East Seed 3',
        winnerSeed: 3,
      });
    });

    it('should give an exact tie to the better seed', () => {
      const [final] = buildBracket('Final', playoffDivision('East', { final: [101, 101] })).matchups;
      expect(final.winner).toBe('East Seed 1');
    });

    it('should read scores when the lower seed is listed at home', () => {
      const teams = [1, 2, 3, 4].map(i => team('West', `W${i}`, { standing: i }));
      const west = division({
        name: 'West',
        currentWeek: 4,
        regularSeasonLength: 3,
        teams,
        matchups: [
          matchup('West', 4, 'W4', 120, 'W1', 80, { bracket: 'WINNERS' }),
          matchup('West', 4, 'W2', 99, 'W3', 98, { bracket: 'WINNERS' }),
        ],
      });
      const [sf1] = buildBracket('Semifinal', west).matchups;
      expect(sf1).toMatchObject({ team1: 'W1', score1: 80, team2: 'W4', score2: 120, winner: 'W4', winnerSeed: 4 });
    });

    it('should ignore consolation games between the same teams', () => {
      const teams = [1, 2, 3, 4].map(i => team('West', `W${i}`, { standing: i }));
      const west = division({
        name: 'West',
        currentWeek: 4,
        regularSeasonLength: 3,
        teams,
        matchups: [matchup('West', 4, 'W1', 70, 'W4', 60, { bracket: 'CONSOLATION' })],
      });
      expect(buildBracket('Semifinal', west).matchups[0].winner).toBeNull();
    });

    it('should refuse a final before both semifinals are decided', () => {
      const east = playoffDivision('East', { semifinal: [null, null, 95, 100] });
      expect(() => buildBracket('Final', east)).toThrow(
        'Semifinal results are incomplete in East; the Final cannot be seeded'
      );
    });

    it('should require four teams', () => {
      const small = division({ name: 'Tiny', teams: ['A', 'B', 'C'].map(n => team('Tiny', n)) });
      expect(() => buildBracket('Semifinal', small)).toThrow(InsufficientDataError);
      expect(() => buildBracket('Semifinal', small)).toThrow('Tiny has 3 team(s); a bracket needs 4');
    });
  });

  describe('bracketRoundsIn', () => {
    it('should list the rounds that have started', () => {
      expect(bracketRoundsIn('RegularSeason')).toEqual([]);
      expect(bracketRoundsIn('Semifinal')).toEqual(['Semifinal']);
      expect(bracketRoundsIn('Final')).toEqual(['Semifinal', 'Final']);
      expect(bracketRoundsIn('Complete')).toEqual(['Semifinal', 'Final']);
    });
  });
});
