import type {
  ChallengeResult,
  DivisionData,
  GameResult,
  TeamGameLine,
  TeamStats,
} from '../../types/index.js';
import { DataValidationError, InsufficientDataError } from './errors.js';
import { createChallengeResult, gameLines } from './models.js';
import { pickFirstBest } from './ranking.js';

const byWeek = (line: TeamGameLine) => line.week;

export function combineTeams(divisions: readonly DivisionData[]): TeamStats[] {
  return divisions.flatMap(d => d.teams);
}

export function combineGames(divisions: readonly DivisionData[]): GameResult[] {
  return divisions.flatMap(d => d.games);
}

function ownerOf(teams: readonly TeamStats[], team: string, division: string): string {
  const match = teams.find(t => t.name === team && t.division === division);
  if (!match)
    throw new DataValidationError(`Game references unknown team '${team}' in division '${division}'`, {
      division,
    });
  return match.owner;
}

function linesOf(games: readonly GameResult[]): TeamGameLine[] {
  return games.flatMap(g => gameLines(g));
}

function requireGames(games: readonly GameResult[], challenge: string): void {
  if (!games.length)
    throw new InsufficientDataError(`No game data available for "${challenge}"`);
}

function gameContext(line: TeamGameLine) {
  return {
    week: line.week,
    opponent: line.opponent,
    score: line.score,
    opponentScore: line.opponentScore,
    margin: line.margin,
  };
}

export function mostPointsOverall(teams: readonly TeamStats[]): ChallengeResult {
  const top = pickFirstBest(teams, { metric: t => t.pointsFor, prefer: 'max' });
  if (!top) throw new InsufficientDataError('No team data available for "Most Points Overall"');
  return createChallengeResult({
    challengeName: 'Most Points Overall',
    winner: top.name,
    owner: top.owner,
    division: top.division,
    value: top.pointsFor,
    context: { wins: top.wins, losses: top.losses, ties: top.ties, pointsAgainst: top.pointsAgainst },
  });
}

export function mostPointsOneGame(
  teams: readonly TeamStats[],
  games: readonly GameResult[]
): ChallengeResult {
  requireGames(games, 'Most Points in One Game');
  const top = pickFirstBest(linesOf(games), { metric: l => l.score, prefer: 'max', week: byWeek });
  if (!top) throw new InsufficientDataError('No game data available for "Most Points in One Game"');
  return createChallengeResult({
    challengeName: 'Most Points in One Game',
    winner: top.team,
    owner: ownerOf(teams, top.team, top.division),
    division: top.division,
    value: top.score,
    context: { ...gameContext(top), won: top.won },
  });
}

export function mostPointsInLoss(
  teams: readonly TeamStats[],
  games: readonly GameResult[]
): ChallengeResult {
  requireGames(games, 'Most Points in a Loss');
  const losses = linesOf(games).filter(l => l.score < l.opponentScore);
  const top = pickFirstBest(losses, { metric: l => l.score, prefer: 'max', week: byWeek });
  if (!top)
    throw new InsufficientDataError(
      `No losses recorded in ${games.length} game(s); "Most Points in a Loss" needs a decisive game`
    );
  return createChallengeResult({
    challengeName: 'Most Points in a Loss',
    winner: top.team,
    owner: ownerOf(teams, top.team, top.division),
    division: top.division,
    value: top.score,
    context: gameContext(top),
  });
}

export function leastPointsInWin(
  teams: readonly TeamStats[],
  games: readonly GameResult[]
): ChallengeResult {
  requireGames(games, 'Least Points in a Win');
  const wins = linesOf(games).filter(l => l.score > l.opponentScore);
  const low = pickFirstBest(wins, { metric: l => l.score, prefer: 'min', week: byWeek });
  if (!low)
    throw new InsufficientDataError(
      `No wins recorded in ${games.length} game(s); "Least Points in a Win" needs a decisive game`
    );
  return createChallengeResult({
    challengeName: 'Least Points in a Win',
    winner: low.team,
    owner: ownerOf(teams, low.team, low.division),
    division: low.division,
    value: low.score,
    context: gameContext(low),
  });
}

export function closestVictory(
  teams: readonly TeamStats[],
  games: readonly GameResult[]
): ChallengeResult {
  requireGames(games, 'Closest Victory');
  // a tie is not a victory
  const wins = linesOf(games).filter(l => l.won && l.margin > 0);
  const closest = pickFirstBest(wins, { metric: l => l.margin, prefer: 'min', week: byWeek });
  if (!closest)
    throw new InsufficientDataError(
      `No decisive games in ${games.length} game(s); "Closest Victory" needs a win`
    );
  return createChallengeResult({
    challengeName: 'Closest Victory',
    winner: closest.team,
    owner: ownerOf(teams, closest.team, closest.division),
    division: closest.division,
    value: closest.margin,
    context: gameContext(closest),
  });
}

/**
 * The five season-long awards across every supplied division, in fixed order.
 * Divisions are concatenated in the order given; ties go to the earliest week,
 * then to the earliest team in that concatenated order (home side first).
 */
export function calculateSeasonChallenges(divisions: readonly DivisionData[]): ChallengeResult[] {
  if (!divisions.length) throw new InsufficientDataError('No division data provided');
  const teams = combineTeams(divisions);
  if (!teams.length) throw new InsufficientDataError('No team data found across all divisions');
  const games = combineGames(divisions);
  return [
    mostPointsOverall(teams),
    mostPointsOneGame(teams, games),
    mostPointsInLoss(teams, games),
    leastPointsInWin(teams, games),
    closestVictory(teams, games),
  ];
}
