import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { loadFromCSV, loadFromJSON, parseRawDivision, selectDivisions, toDivisionData } from './dataLoader.js';
import { ConfigurationError, DataValidationError } from './errors.js';

function rawNorth(name = 'North') {
  return {
    leagueId: 9,
    name,
    currentWeek: 3,
    regularSeasonLength: 2,
    teams: [
      { name: 'A', owner: 'Owner A', wins: 2, losses: 0, pointsFor: 195, pointsAgainst: 187 },
      { name: 'B', owner: 'Owner B', wins: 0, losses: 1, pointsFor: 90, pointsAgainst: 100 },
      { name: 'C', owner: 'Owner C', wins: 1, losses: 0, pointsFor: 177, pointsAgainst: 95 },
      { name: 'D', owner: 'Owner D', wins: 0, losses: 1, pointsFor: 0, pointsAgainst: 80, standing: 4 },
    ],
    matchups: [
      { week: 1, home: 'A', away: 'B', homeScore: 100, awayScore: 90 },
      { week: 1, home: 'C', away: 'D', homeScore: 80, awayScore: 0 },
      { week: 2, home: 'A', away: 'C', homeScore: 95, awayScore: 97 },
      { week: 2, home: 'B', away: 'D', homeScore: null, awayScore: null },
      { week: 3, home: 'A', away: 'D', homeScore: 110, awayScore: 105, homeProjected: 100, awayProjected: 98, bracket: 'WINNERS' },
      { week: 3, home: 'B', away: 'C', homeScore: 92, awayScore: 96, bracket: 'CONSOLATION' },
    ],
    players: [
      { week: 3, team: 'A', name: 'A Quarterback', position: 'QB', lineupSlot: 'QB', proTeam: 'KC', points: 20, projectedPoints: 18 },
      { week: 3, team: 'A', name: 'A Runner', position: 'RB', lineupSlot: 'RB', points: 15, projectedPoints: 12 },
      { week: 3, team: 'A', name: 'A Backup', position: 'WR', lineupSlot: 'BE', points: 9, projectedPoints: 7, injuryStatus: 'OUT' },
      { week: 3, team: 'D', name: 'D Quarterback', position: 'QB', lineupSlot: 'QB', points: 25, projectedPoints: 21 },
      { week: 3, team: 'D', name: 'D Flex', position: 'RB', lineupSlot: 'FLEX', points: 10, projectedPoints: 9 },
      { week: 3, team: 'D', name: 'D Linebacker', position: 'LB', lineupSlot: 'DP', points: 6, projectedPoints: 4 },
    ],
  };
}

describe('Data Loader', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('parseRawDivision', () => {
    it('should apply defaults', () => {
      const raw = parseRawDivision(rawNorth(), 'north.json');
      expect(raw.playoffRoundCount).toBe(2);
      expect(raw.teams[0].ties).toBe(0);
      expect(raw.matchups[0].bracket).toBe('NONE');
      expect(raw.players[1].proTeam).toBe('');
      expect(raw.players[1].onBye).toBe(false);
    });

    it('should name the invalid field', () => {
      const { name: _name, ...missing } = rawNorth();
      expect(() => parseRawDivision(missing, 'north.json')).toThrow(DataValidationError);
      expect(() => parseRawDivision(missing, 'north.json')).toThrow(/^Invalid division data in north\.json: name: /);
    });
  });

  describe('toDivisionData', () => {
    it('should keep only fully scored regular-season games', () => {
      const data = toDivisionData(parseRawDivision(rawNorth(), 'north.json'));
      expect(data.week).toBe(3);
      expect(data.games.map(g => [g.week, g.homeTeam, g.awayTeam])).toEqual([
        [1, 'A', 'B'],
        [2, 'A', 'C'],
      ]);
      expect(console.warn).toHaveBeenCalledWith('Skipped 2 unscored matchup(s) in North');
      expect(data.teams.map(t => t.division)).toEqual(['North', 'North', 'North', 'North']);
      expect(data.teams[3].standing).toBe(4);
    });

    it('should build two weekly lines per scored matchup with starter projections', () => {
      const data = toDivisionData(parseRawDivision(rawNorth(), 'north.json'));
      expect(
        data.weeklyGames.map(g => [g.team, g.score, g.projectedScore, g.starterProjectedScore, g.trueProjectionDiff])
      ).toEqual([
        ['A', 110, 100, 30, 80],
        ['D', 105, 98, 34, 71],
        ['B', 92, 0, null, null],
        ['C', 96, 0, null, null],
      ]);
    });

    it('should keep starters at the fixed positions as weekly players', () => {
      const data = toDivisionData(parseRawDivision(rawNorth(), 'north.json'));
      expect(data.weeklyPlayers.map(p => p.name)).toEqual(['A Quarterback', 'A Runner', 'D Quarterback', 'D Flex']);
      expect(data.rosters).toHaveLength(6);
      expect(data.rosters[2]).toMatchObject({ lineupSlot: 'BE', injuryStatus: 'OUT', proTeam: '' });
    });

    it('should analyse an explicit week', () => {
      const data = toDivisionData(parseRawDivision(rawNorth(), 'north.json'), { week: 2 });
      expect(data.week).toBe(2);
      expect(data.weeklyGames.map(g => g.team)).toEqual(['A', 'C']);
      expect(data.weeklyPlayers).toEqual([]);
    });

    it('should fall back a week while the current week is unscored', () => {
      const raw = rawNorth();
      raw.matchups[5] = { week: 3, home: 'B', away: 'C', homeScore: null, awayScore: null };
      const data = toDivisionData(parseRawDivision(raw, 'north.json'));
      expect(data.week).toBe(2);
      expect(data.settings.currentWeek).toBe(3);
    });
  });

  describe('selectDivisions', () => {
    const all = [{ name: 'North' }, { name: 'South' }];

    it('should keep everything without a selection', () => {
      expect(selectDivisions(all, [])).toEqual(all);
    });

    it('should follow the requested order', () => {
      expect(selectDivisions(all, ['South', 'North']).map(d => d.name)).toEqual(['South', 'North']);
    });

    it('should reject unknown names', () => {
      expect(() => selectDivisions(all, ['Nope'])).toThrow('Unknown division "Nope"; available: North, South');
    });
  });

  describe('file loaders', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'league-data-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should load every JSON file in name order', () => {
      fs.writeFileSync(path.join(dir, 'b.json'), JSON.stringify(rawNorth('South')));
      fs.writeFileSync(path.join(dir, 'a.json'), JSON.stringify(rawNorth('North')));
      fs.writeFileSync(path.join(dir, 'notes.txt'), 'ignored');
      const divisions = loadFromJSON(dir);
      expect(divisions.map(d => d.name)).toEqual(['North', 'South']);
      expect(console.log).toHaveBeenCalledWith(`Loaded 2 division(s) from ${dir}`);
    });

    it('should apply the division selection and week override', () => {
      fs.writeFileSync(path.join(dir, 'a.json'), JSON.stringify(rawNorth('North')));
      fs.writeFileSync(path.join(dir, 'b.json'), JSON.stringify(rawNorth('South')));
      const divisions = loadFromJSON(dir, { divisions: ['South'], week: 2 });
      expect(divisions.map(d => [d.name, d.week])).toEqual([['South', 2]]);
    });

    it('should report unreadable JSON', () => {
      fs.writeFileSync(path.join(dir, 'a.json'), '{ nope');
      expect(() => loadFromJSON(dir)).toThrow(`Could not parse ${path.join(dir, 'a.json')}`);
    });

    it('should report an empty directory', () => {
      expect(() => loadFromJSON(dir)).toThrow(`No division data found in ${dir}`);
    });

    it('should report a missing directory', () => {
      const missing = path.join(dir, 'missing');
      expect(() => loadFromJSON(missing)).toThrow(ConfigurationError);
      expect(() => loadFromJSON(missing)).toThrow(`Data directory not found: ${missing}`);
    });

    it('should load the CSV layout', () => {
      fs.writeFileSync(
        path.join(dir, 'divisions.csv'),
        'leagueId,name,currentWeek,regularSeasonLength,playoffRoundCount\n9,North,3,2,2\n'
      );
      fs.writeFileSync(
        path.join(dir, 'teams.csv'),
        [
          'division,id,name,owner,wins,losses,ties,pointsFor,pointsAgainst,standing',
          'North,,A,Owner A,2,0,,195,187,1',
          'North,,B,Owner B,0,1,,90,100,',
          'North,,C,Owner C,1,0,,177,95,',
          'North,,D,Owner D,0,1,,0,80,',
          'South,,Z,Owner Z,0,0,,0,0,',
        ].join('\n')
      );
      fs.writeFileSync(
        path.join(dir, 'matchups.csv'),
        [
          'division,week,home,away,homeScore,awayScore,homeProjected,awayProjected,bracket',
          'North,1,A,B,100,90,,,',
          'North,2,A,C,95,97,,,',
          'North,3,A,D,110,105,100,98,WINNERS',
        ].join('\n')
      );
      fs.writeFileSync(
        path.join(dir, 'players.csv'),
        [
          'division,week,team,name,position,lineupSlot,proTeam,points,projectedPoints,injuryStatus,onBye',
          'North,3,A,A Quarterback,QB,QB,KC,20,18,,false',
          'North,3,D,D Kicker,K,K,DAL,8,7.5,QUESTIONABLE,true',
        ].join('\n')
      );
      const [north] = loadFromCSV(dir);
      expect(north.name).toBe('North');
      expect(north.teams.map(t => t.name)).toEqual(['A', 'B', 'C', 'D']);
      expect(north.teams[0]).toMatchObject({ id: 'a', ties: 0, standing: 1 });
      expect(north.games).toHaveLength(2);
      expect(north.matchups[2]).toMatchObject({ bracket: 'WINNERS', homeProjected: 100 });
      expect(north.matchups[0].homeProjected).toBeNull();
      expect(north.weeklyGames.map(g => [g.team, g.starterProjectedScore])).toEqual([
        ['A', 18],
        ['D', 7.5],
      ]);
      expect(north.rosters[1]).toMatchObject({ injuryStatus: 'QUESTIONABLE', onBye: true, proTeam: 'DAL' });
    });

    it('should require every CSV file', () => {
      fs.writeFileSync(path.join(dir, 'divisions.csv'), 'leagueId,name,currentWeek,regularSeasonLength\n');
      expect(() => loadFromCSV(dir)).toThrow(`Missing CSV file: ${path.join(dir, 'teams.csv')}`);
    });
  });
});
