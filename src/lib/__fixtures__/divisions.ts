import type {
  DivisionData,
  GameResult,
  Matchup,
  RosterEntry,
  TeamStats,
  WeeklyGameResult,
  WeeklyPlayerStats,
} from '../../../types/index.js';
import {
  createDivisionData,
  createGameResult,
  createMatchup,
  createRosterEntry,
  createTeamStats,
  type MatchupInput,
  type RosterEntryInput,
  type TeamStatsInput,
} from '../models.js';

export function team(division: string, name: string, overrides: Partial<TeamStatsInput> = {}): TeamStats {
  return createTeamStats({
    name,
    owner: `${name} Owner`,
    division,
    wins: 0,
    losses: 0,
    pointsFor: 0,
    pointsAgainst: 0,
    ...overrides,
  });
}

export function game(
  division: string,
  week: number,
  homeTeam: string,
  homeScore: number,
  awayTeam: string,
  awayScore: number
): GameResult {
  return createGameResult({ division, week, homeTeam, awayTeam, homeScore, awayScore });
}

export function matchup(
  division: string,
  week: number,
  homeTeam: string,
  homeScore: number | null,
  awayTeam: string,
  awayScore: number | null,
  extra: Partial<MatchupInput> = {}
): Matchup {
  return createMatchup({ division, week, homeTeam, awayTeam, homeScore, awayScore, ...extra });
}

export function starter(
  division: string,
  week: number,
  teamName: string,
  lineupSlot: string,
  points: number,
  projectedPoints: number,
  extra: Partial<RosterEntryInput> = {}
): RosterEntry {
  return createRosterEntry({
    division,
    week,
    team: teamName,
    playerName: `${teamName} ${lineupSlot}`,
    position: lineupSlot,
    lineupSlot,
    points,
    projectedPoints,
    ...extra,
  });
}

export interface DivisionFixture {
  name: string;
  teams: TeamStats[];
  currentWeek?: number;
  regularSeasonLength?: number;
  week?: number;
  games?: GameResult[];
  matchups?: Matchup[];
  weeklyGames?: WeeklyGameResult[];
  weeklyPlayers?: WeeklyPlayerStats[];
  rosters?: RosterEntry[];
}

export function division(fixture: DivisionFixture): DivisionData {
  const currentWeek = fixture.currentWeek ?? 5;
  return createDivisionData({
    leagueId: 1,
    name: fixture.name,
    settings: {
      currentWeek,
      regularSeasonLength: fixture.regularSeasonLength ?? 14,
      playoffRoundCount: 2,
    },
    week: fixture.week ?? Math.min(currentWeek, 18),
    teams: fixture.teams,
    games: fixture.games,
    matchups: fixture.matchups,
    weeklyGames: fixture.weeklyGames,
    weeklyPlayers: fixture.weeklyPlayers,
    rosters: fixture.rosters,
  });
}

/**
 * Four seeded teams (standings 1-4) with a scored semifinal round and Final
 * in the two weeks after a three-week regular season.
 */
export function playoffDivision(
  name: string,
  opts: {
    currentWeek?: number;
    semifinal?: [number | null, number | null, number | null, number | null];
    final?: [number | null, number | null];
    rosters?: RosterEntry[];
    games?: GameResult[];
  } = {}
): DivisionData {
  const [n1, n2, n3, n4] = [1, 2, 3, 4].map(i => `${name} Seed ${i}`);
  const [sf1Home, sf1Away, sf2Home, sf2Away] = opts.semifinal ?? [110, 90, 95, 100];
  const [finalHome, finalAway] = opts.final ?? [null, null];
  const matchups: Matchup[] = [
    matchup(name, 4, n1, sf1Home, n4, sf1Away, { bracket: 'WINNERS' }),
    matchup(name, 4, n2, sf2Home, n3, sf2Away, { bracket: 'WINNERS' }),
  ];
  if (opts.final) {
    // seed 1 vs seed 3 under the default semifinal scores
    matchups.push(matchup(name, 5, n1, finalHome, n3, finalAway, { bracket: 'WINNERS' }));
  }
  return division({
    name,
    currentWeek: opts.currentWeek ?? 6,
    regularSeasonLength: 3,
    teams: [n1, n2, n3, n4].map((t, i) => team(name, t, { standing: i + 1 })),
    matchups,
    games: opts.games,
    rosters: opts.rosters,
  });
}
