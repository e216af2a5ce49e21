// Validating factories for the domain records. Every factory either returns a
// frozen record or throws DataValidationError naming the offending field.
import {
  POSITIONS,
  type BracketRound,
  type BracketType,
  type ChallengeContext,
  type ChallengeResult,
  type ChallengeType,
  type ChampionshipEntry,
  type ChampionshipLeaderboard,
  type ChampionshipProgress,
  type ChampionshipRoster,
  type DivisionChampion,
  type DivisionData,
  type GameResult,
  type LeagueSettings,
  type Matchup,
  type PlayoffBracket,
  type PlayoffMatchup,
  type PlayoffPhase,
  type PlayoffRoundSummary,
  type Position,
  type ProgressStatus,
  type RosterEntry,
  type RosterSlot,
  type SeasonChallengeName,
  type SeasonStatus,
  type SeasonStructure,
  type SeasonSummary,
  type TeamGameLine,
  type TeamStats,
  type WeeklyChallenge,
  type WeeklyGameResult,
  type WeeklyPlayerStats,
} from '../../types/index.js';
import { DataValidationError } from './errors.js';
import { idify, roundPoints } from './ids.js';

export const MAX_WEEK = 18;
export const SUPPORTED_PLAYOFF_ROUNDS = 2;

function requireText(value: string, field: string): string {
  if (!value.trim()) throw new DataValidationError(`${field} cannot be empty`);
  return value;
}

function requireFinite(value: number, field: string): number {
  if (!Number.isFinite(value)) throw new DataValidationError(`${field} must be a finite number: ${value}`);
  return value;
}

function requireNonNegative(value: number, field: string): number {
  requireFinite(value, field);
  if (value < 0) throw new DataValidationError(`${field} cannot be negative: ${value}`);
  return value;
}

function requireCount(value: number, field: string): number {
  if (!Number.isInteger(value) || value < 0)
    throw new DataValidationError(`${field} must be a non-negative integer: ${value}`);
  return value;
}

export function requireWeek(value: number, field = 'week'): number {
  if (!Number.isInteger(value) || value < 1 || value > MAX_WEEK)
    throw new DataValidationError(`${field} must be between 1 and ${MAX_WEEK}: ${value}`);
  return value;
}

function requireNullableScore(value: number | null, field: string): number | null {
  return value === null ? null : requireNonNegative(value, field);
}

export function isPosition(value: string): value is Position {
  return (POSITIONS as readonly string[]).includes(value);
}

export function createLeagueSettings(input: LeagueSettings): LeagueSettings {
  if (!Number.isInteger(input.currentWeek) || input.currentWeek < 1)
    throw new DataValidationError(`currentWeek must be a positive integer: ${input.currentWeek}`);
  requireWeek(input.regularSeasonLength, 'regularSeasonLength');
  if (input.playoffRoundCount !== SUPPORTED_PLAYOFF_ROUNDS)
    throw new DataValidationError(
      `playoffRoundCount must be ${SUPPORTED_PLAYOFF_ROUNDS}: ${input.playoffRoundCount}`
    );
  return Object.freeze({ ...input });
}

export interface TeamStatsInput {
  id?: string;
  name: string;
  owner: string;
  division: string;
  wins: number;
  losses: number;
  ties?: number;
  pointsFor: number;
  pointsAgainst: number;
  standing?: number;
}

export function createTeamStats(input: TeamStatsInput): TeamStats {
  requireText(input.name, 'Team name');
  requireText(input.owner, 'owner');
  requireText(input.division, 'division');
  requireNonNegative(input.pointsFor, 'pointsFor');
  requireNonNegative(input.pointsAgainst, 'pointsAgainst');
  requireCount(input.wins, 'wins');
  requireCount(input.losses, 'losses');
  const ties = requireCount(input.ties ?? 0, 'ties');
  if (input.standing !== undefined && (!Number.isInteger(input.standing) || input.standing < 1))
    throw new DataValidationError(`standing must be a positive integer: ${input.standing}`);
  return Object.freeze({
    id: input.id ?? idify(input.name),
    name: input.name,
    owner: input.owner,
    division: input.division,
    wins: input.wins,
    losses: input.losses,
    ties,
    pointsFor: input.pointsFor,
    pointsAgainst: input.pointsAgainst,
    ...(input.standing !== undefined ? { standing: input.standing } : {}),
  });
}

export function winPercentage(team: TeamStats): number {
  const total = team.wins + team.losses + team.ties;
  if (!total) return 0;
  return (team.wins + team.ties * 0.5) / total;
}

export type GameResultInput = Omit<GameResult, 'margin'>;

export function createGameResult(input: GameResultInput): GameResult {
  requireText(input.division, 'division');
  requireWeek(input.week);
  requireText(input.homeTeam, 'homeTeam');
  requireText(input.awayTeam, 'awayTeam');
  if (input.homeTeam === input.awayTeam)
    throw new DataValidationError(`homeTeam and awayTeam must differ: ${input.homeTeam}`);
  requireNonNegative(input.homeScore, 'homeScore');
  requireNonNegative(input.awayScore, 'awayScore');
  return Object.freeze({ ...input, margin: roundPoints(Math.abs(input.homeScore - input.awayScore)) });
}

/** Home side first, then away side. */
export function gameLines(game: GameResult): [TeamGameLine, TeamGameLine] {
  const base = { division: game.division, week: game.week, margin: game.margin };
  return [
    Object.freeze({
      ...base,
      team: game.homeTeam,
      opponent: game.awayTeam,
      score: game.homeScore,
      opponentScore: game.awayScore,
      won: game.homeScore > game.awayScore,
    }),
    Object.freeze({
      ...base,
      team: game.awayTeam,
      opponent: game.homeTeam,
      score: game.awayScore,
      opponentScore: game.homeScore,
      won: game.awayScore > game.homeScore,
    }),
  ];
}

export interface MatchupInput {
  division: string;
  week: number;
  homeTeam: string;
  awayTeam: string;
  homeScore: number | null;
  awayScore: number | null;
  homeProjected?: number | null;
  awayProjected?: number | null;
  bracket?: BracketType;
}

export function createMatchup(input: MatchupInput): Matchup {
  requireText(input.division, 'division');
  requireWeek(input.week);
  requireText(input.homeTeam, 'homeTeam');
  requireText(input.awayTeam, 'awayTeam');
  return Object.freeze({
    division: input.division,
    week: input.week,
    homeTeam: input.homeTeam,
    awayTeam: input.awayTeam,
    homeScore: requireNullableScore(input.homeScore, 'homeScore'),
    awayScore: requireNullableScore(input.awayScore, 'awayScore'),
    homeProjected: requireNullableScore(input.homeProjected ?? null, 'homeProjected'),
    awayProjected: requireNullableScore(input.awayProjected ?? null, 'awayProjected'),
    bracket: input.bracket ?? 'NONE',
  });
}

/** Both scores posted and not a 0-0 placeholder. */
export function isMatchupComplete(matchup: Matchup): boolean {
  if (matchup.homeScore === null || matchup.awayScore === null) return false;
  return matchup.homeScore > 0 || matchup.awayScore > 0;
}

export interface WeeklyGameResultInput {
  division: string;
  week: number;
  team: string;
  opponent: string;
  score: number;
  opponentScore: number;
  projectedScore: number;
  starterProjectedScore: number | null;
}

export function createWeeklyGameResult(input: WeeklyGameResultInput): WeeklyGameResult {
  requireText(input.division, 'division');
  requireWeek(input.week);
  requireText(input.team, 'team');
  requireText(input.opponent, 'opponent');
  requireNonNegative(input.score, 'score');
  requireNonNegative(input.opponentScore, 'opponentScore');
  requireNonNegative(input.projectedScore, 'projectedScore');
  requireNullableScore(input.starterProjectedScore, 'starterProjectedScore');
  return Object.freeze({
    ...input,
    won: input.score > input.opponentScore,
    margin: roundPoints(Math.abs(input.score - input.opponentScore)),
    projectionDiff: roundPoints(input.score - input.projectedScore),
    trueProjectionDiff:
      input.starterProjectedScore === null
        ? null
        : roundPoints(input.score - input.starterProjectedScore),
  });
}

export interface WeeklyPlayerStatsInput {
  division: string;
  week: number;
  name: string;
  position: string;
  team: string;
  proTeam?: string;
  points: number;
  projectedPoints: number;
}

export function createWeeklyPlayerStats(input: WeeklyPlayerStatsInput): WeeklyPlayerStats {
  requireText(input.division, 'division');
  requireWeek(input.week);
  requireText(input.name, 'Player name');
  requireText(input.team, 'team');
  const { position } = input;
  if (!isPosition(position)) throw new DataValidationError(`Invalid position: ${position}`);
  // player points go negative on turnovers and missed kicks; projections do not
  requireFinite(input.points, 'points');
  requireNonNegative(input.projectedPoints, 'projectedPoints');
  return Object.freeze({
    division: input.division,
    week: input.week,
    name: input.name,
    position,
    team: input.team,
    proTeam: input.proTeam ?? '',
    points: input.points,
    projectedPoints: input.projectedPoints,
  });
}

export const NON_STARTER_SLOTS: readonly string[] = ['BE', 'BN', 'IR'];

export function isStarterSlot(slot: string): boolean {
  return !NON_STARTER_SLOTS.includes(slot);
}

export interface RosterEntryInput {
  division: string;
  week: number;
  team: string;
  playerName: string;
  position: string;
  lineupSlot: string;
  proTeam?: string;
  points: number;
  projectedPoints: number;
  injuryStatus?: string | null;
  onBye?: boolean;
}

export function createRosterEntry(input: RosterEntryInput): RosterEntry {
  requireText(input.division, 'division');
  requireWeek(input.week);
  requireText(input.team, 'team');
  requireText(input.playerName, 'playerName');
  requireText(input.position, 'position');
  requireText(input.lineupSlot, 'lineupSlot');
  requireFinite(input.points, 'points');
  requireNonNegative(input.projectedPoints, 'projectedPoints');
  return Object.freeze({
    division: input.division,
    week: input.week,
    team: input.team,
    playerName: input.playerName,
    position: input.position,
    lineupSlot: input.lineupSlot,
    proTeam: input.proTeam ?? '',
    points: input.points,
    projectedPoints: input.projectedPoints,
    injuryStatus: input.injuryStatus ?? null,
    onBye: input.onBye ?? false,
  });
}

export interface DivisionDataInput {
  leagueId: number;
  name: string;
  settings: LeagueSettings;
  week: number;
  teams: readonly TeamStats[];
  games?: readonly GameResult[];
  matchups?: readonly Matchup[];
  weeklyGames?: readonly WeeklyGameResult[];
  weeklyPlayers?: readonly WeeklyPlayerStats[];
  rosters?: readonly RosterEntry[];
}

export function createDivisionData(input: DivisionDataInput): DivisionData {
  if (!Number.isInteger(input.leagueId) || input.leagueId <= 0)
    throw new DataValidationError(`leagueId must be positive: ${input.leagueId}`);
  requireText(input.name, 'Division name');
  requireWeek(input.week);
  const name = input.name;
  const owned = <T extends { division: string }>(records: readonly T[] | undefined, kind: string) => {
    const list = records ?? [];
    for (const r of list)
      if (r.division !== name)
        throw new DataValidationError(`${kind} has division '${r.division}' but should be '${name}'`);
    return Object.freeze([...list]);
  };
  return Object.freeze({
    leagueId: input.leagueId,
    name,
    settings: createLeagueSettings(input.settings),
    week: input.week,
    teams: owned(input.teams, 'Team'),
    games: owned(input.games, 'Game'),
    matchups: owned(input.matchups, 'Matchup'),
    weeklyGames: owned(input.weeklyGames, 'Weekly game'),
    weeklyPlayers: owned(input.weeklyPlayers, 'Weekly player'),
    rosters: owned(input.rosters, 'Roster entry'),
  });
}

export function createChallengeResult(input: {
  challengeName: SeasonChallengeName;
  winner: string;
  owner: string;
  division: string;
  value: number;
  context: ChallengeContext;
}): ChallengeResult {
  requireText(input.winner, 'winner');
  requireText(input.division, 'division');
  requireFinite(input.value, 'value');
  return Object.freeze({ ...input, context: Object.freeze({ ...input.context }) });
}

export function createWeeklyChallenge(input: {
  challengeName: string;
  challengeType: ChallengeType;
  week: number;
  winner: string;
  division: string;
  value: number;
  context: ChallengeContext;
}): WeeklyChallenge {
  requireText(input.challengeName, 'challengeName');
  requireWeek(input.week);
  requireText(input.winner, 'winner');
  requireText(input.division, 'division');
  requireFinite(input.value, 'value');
  return Object.freeze({ ...input, context: Object.freeze({ ...input.context }) });
}

export function createPlayoffMatchup(input: PlayoffMatchup): PlayoffMatchup {
  requireText(input.matchupId, 'matchupId');
  requireText(input.roundName, 'roundName');
  requireText(input.division, 'division');
  requireText(input.team1, 'team1');
  requireText(input.team2, 'team2');
  if (input.seed1 <= 0 || input.seed2 <= 0)
    throw new DataValidationError(`Seeds must be positive: seed1=${input.seed1}, seed2=${input.seed2}`);
  requireNullableScore(input.score1, 'score1');
  requireNullableScore(input.score2, 'score2');
  if (input.winner !== null && input.winner !== input.team1 && input.winner !== input.team2)
    throw new DataValidationError(
      `winner must be one of the teams: ${input.winner} not in [${input.team1}, ${input.team2}]`
    );
  if (input.winnerSeed !== null && input.winnerSeed !== input.seed1 && input.winnerSeed !== input.seed2)
    throw new DataValidationError(`winnerSeed must match one of the seeds: ${input.winnerSeed}`);
  return Object.freeze({ ...input });
}

const MATCHUPS_PER_ROUND: Record<BracketRound, number> = { Semifinal: 2, Final: 1 };

export function createPlayoffBracket(input: {
  round: BracketRound;
  week: number;
  division: string;
  matchups: readonly PlayoffMatchup[];
}): PlayoffBracket {
  requireWeek(input.week);
  requireText(input.division, 'division');
  const expected = MATCHUPS_PER_ROUND[input.round];
  if (input.matchups.length !== expected)
    throw new DataValidationError(
      `${input.round} must have exactly ${expected} matchup(s), got ${input.matchups.length}`
    );
  return Object.freeze({ ...input, matchups: Object.freeze([...input.matchups]) });
}

export function createRosterSlot(input: RosterSlot): RosterSlot {
  requireText(input.slot, 'slot');
  if (input.playerName !== null) requireText(input.playerName, 'playerName');
  requireFinite(input.points, 'points');
  requireNonNegative(input.projectedPoints, 'projectedPoints');
  return Object.freeze({ ...input });
}

export const INJURY_WARNINGS: readonly string[] = ['OUT', 'DOUBTFUL', 'QUESTIONABLE'];

export function createChampionshipRoster(input: {
  team: string;
  owner: string;
  division: string;
  seed: number;
  week: number;
  starters: readonly RosterSlot[];
  bench: readonly RosterSlot[];
}): ChampionshipRoster {
  requireText(input.team, 'team');
  requireText(input.division, 'division');
  requireWeek(input.week);
  if (!Number.isInteger(input.seed) || input.seed < 1)
    throw new DataValidationError(`seed must be a positive integer: ${input.seed}`);

  let total = 0;
  let projected = 0;
  for (const s of input.starters) {
    total += s.points;
    projected += s.projectedPoints;
  }
  const warnings: string[] = [];
  for (const s of input.starters) {
    if (s.injuryStatus && INJURY_WARNINGS.includes(s.injuryStatus))
      warnings.push(`${s.slot} ${s.playerName} (${s.injuryStatus})`);
    if (s.onBye) warnings.push(`${s.slot} ${s.playerName} (BYE week)`);
  }
  for (const s of input.bench)
    if (s.playerName && s.injuryStatus && INJURY_WARNINGS.includes(s.injuryStatus))
      warnings.push(`Bench ${s.slot} ${s.playerName} (${s.injuryStatus})`);

  return Object.freeze({
    ...input,
    starters: Object.freeze([...input.starters]),
    bench: Object.freeze([...input.bench]),
    totalScore: roundPoints(total),
    projectedScore: roundPoints(projected),
    emptySlots: Object.freeze(input.starters.filter(s => !s.playerName).map(s => s.slot)),
    warnings: Object.freeze(warnings),
  });
}

export function createChampionshipProgress(input: {
  gamesCompleted: number;
  totalGames: number;
}): ChampionshipProgress {
  requireCount(input.gamesCompleted, 'gamesCompleted');
  requireCount(input.totalGames, 'totalGames');
  if (input.totalGames === 0) throw new DataValidationError('totalGames must be positive');
  if (input.gamesCompleted > input.totalGames)
    throw new DataValidationError(
      `gamesCompleted cannot exceed totalGames: ${input.gamesCompleted} > ${input.totalGames}`
    );
  let status: ProgressStatus = 'in_progress';
  if (input.gamesCompleted === 0) status = 'not_started';
  else if (input.gamesCompleted === input.totalGames) status = 'final';
  return Object.freeze({
    status,
    gamesCompleted: input.gamesCompleted,
    totalGames: input.totalGames,
    completionPct: Number(((input.gamesCompleted / input.totalGames) * 100).toFixed(1)),
  });
}

export function createChampionshipEntry(input: ChampionshipEntry): ChampionshipEntry {
  if (!Number.isInteger(input.rank) || input.rank < 1)
    throw new DataValidationError(`rank must be positive: ${input.rank}`);
  requireFinite(input.score, 'score');
  requireNonNegative(input.projectedScore, 'projectedScore');
  requireText(input.team, 'team');
  requireText(input.owner, 'owner');
  requireText(input.division, 'division');
  if (input.isChampion !== (input.rank === 1))
    throw new DataValidationError(`isChampion must be set exactly for rank 1 (rank ${input.rank})`);
  return Object.freeze({ ...input });
}

export function createChampionshipLeaderboard(input: {
  week: number;
  entries: readonly ChampionshipEntry[];
  rosters: readonly ChampionshipRoster[];
  progress: ChampionshipProgress;
}): ChampionshipLeaderboard {
  requireWeek(input.week);
  if (!input.entries.length) throw new DataValidationError('entries cannot be empty');
  input.entries.forEach((e, i) => {
    if (e.rank !== i + 1)
      throw new DataValidationError(`entries must be ranked sequentially; position ${i + 1} has rank ${e.rank}`);
    if (i > 0 && e.score > input.entries[i - 1].score)
      throw new DataValidationError(`entries must be sorted by score descending at rank ${e.rank}`);
  });
  return Object.freeze({
    ...input,
    entries: Object.freeze([...input.entries]),
    rosters: Object.freeze([...input.rosters]),
  });
}


/** Regular season from week 1, one week per playoff round, then championship week. */
export function createSeasonStructure(settings: LeagueSettings): SeasonStructure {
  const checked = createLeagueSettings(settings);
  const playoffStart = checked.regularSeasonLength + 1;
  const playoffEnd = checked.regularSeasonLength + checked.playoffRoundCount;
  return Object.freeze({
    regularSeasonStart: 1,
    regularSeasonEnd: checked.regularSeasonLength,
    playoffStart,
    playoffEnd,
    championshipWeek: playoffEnd + 1,
    playoffRounds: checked.playoffRoundCount,
  });
}

export function createDivisionChampion(team: TeamStats): DivisionChampion {
  return Object.freeze({
    division: team.division,
    team: team.name,
    owner: team.owner,
    wins: team.wins,
    losses: team.losses,
    ties: team.ties,
    pointsFor: team.pointsFor,
    pointsAgainst: team.pointsAgainst,
    winPercentage: Number(winPercentage(team).toFixed(3)),
  });
}

export function createPlayoffRoundSummary(input: {
  round: BracketRound;
  week: number;
  brackets: readonly PlayoffBracket[];
}): PlayoffRoundSummary {
  requireWeek(input.week);
  if (!input.brackets.length) throw new DataValidationError(`${input.round} round has no brackets`);
  const stray = input.brackets.find(b => b.round !== input.round || b.week !== input.week);
  if (stray)
    throw new DataValidationError(
      `${stray.division} ${stray.round} bracket (week ${stray.week}) does not belong to the ${input.round} round`
    );
  return Object.freeze({ ...input, brackets: Object.freeze([...input.brackets]) });
}

export const SEASON_CHALLENGE_COUNT = 5;

export function createSeasonSummary(input: {
  year: number;
  generatedAt: string;
  status: SeasonStatus;
  phase: PlayoffPhase;
  structure: SeasonStructure;
  divisionChampions: readonly DivisionChampion[];
  seasonChallenges: readonly ChallengeResult[];
  playoffs: readonly PlayoffRoundSummary[];
  championship: ChampionshipLeaderboard | null;
}): SeasonSummary {
  if (!Number.isInteger(input.year) || input.year < 2000 || input.year > 2100)
    throw new DataValidationError(`year must be between 2000 and 2100: ${input.year}`);
  if (Number.isNaN(Date.parse(input.generatedAt)))
    throw new DataValidationError(`generatedAt must be an ISO 8601 timestamp: ${input.generatedAt}`);
  if (!input.divisionChampions.length)
    throw new DataValidationError('divisionChampions cannot be empty');
  if (input.seasonChallenges.length !== SEASON_CHALLENGE_COUNT)
    throw new DataValidationError(
      `seasonChallenges must hold ${SEASON_CHALLENGE_COUNT} results, got ${input.seasonChallenges.length}`
    );
  for (const round of input.playoffs)
    if (round.week < input.structure.playoffStart || round.week > input.structure.playoffEnd)
      throw new DataValidationError(
        `${round.round} week ${round.week} is outside the playoffs (weeks ${input.structure.playoffStart}-${input.structure.playoffEnd})`
      );
  return Object.freeze({
    ...input,
    divisionChampions: Object.freeze([...input.divisionChampions]),
    seasonChallenges: Object.freeze([...input.seasonChallenges]),
    playoffs: Object.freeze([...input.playoffs]),
  });
}
