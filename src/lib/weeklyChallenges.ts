import {
  POSITIONS,
  type WeeklyChallenge,
  type WeeklyGameResult,
  type WeeklyPlayerStats,
} from '../../types/index.js';
import { InsufficientDataError } from './errors.js';
import { createWeeklyChallenge, requireWeek } from './models.js';
import { pickFirstBest } from './ranking.js';

// Weekly data has no chronological axis, so ties resolve by input order alone.

function teamChallenge(
  name: string,
  week: number,
  game: WeeklyGameResult,
  value: number,
  extra: Record<string, string | number | boolean | null> = {}
): WeeklyChallenge {
  return createWeeklyChallenge({
    challengeName: name,
    challengeType: 'team',
    week,
    winner: game.team,
    division: game.division,
    value,
    context: {
      score: game.score,
      opponent: game.opponent,
      opponentScore: game.opponentScore,
      won: game.won,
      ...extra,
    },
  });
}

function playerChallenge(name: string, week: number, player: WeeklyPlayerStats): WeeklyChallenge {
  return createWeeklyChallenge({
    challengeName: name,
    challengeType: 'player',
    week,
    winner: player.name,
    division: player.division,
    value: player.points,
    context: {
      position: player.position,
      team: player.team,
      proTeam: player.proTeam,
      projectedPoints: player.projectedPoints,
    },
  });
}

/** True when every game carries a starter projection, the precondition for projection awards. */
export function hasStarterProjections(games: readonly WeeklyGameResult[]): boolean {
  return games.length > 0 && games.every(g => g.starterProjectedScore !== null);
}

/**
 * Four score-based team awards, plus Overachiever and Below Expectations when
 * every game has a starter projection. The provider's own projection is never
 * used for those two: it is re-estimated while games are live.
 */
export function calculateTeamChallenges(
  games: readonly WeeklyGameResult[],
  week: number
): WeeklyChallenge[] {
  requireWeek(week);
  if (!games.length) throw new InsufficientDataError(`No weekly game data for week ${week}`);

  const highest = pickFirstBest(games, { metric: g => g.score, prefer: 'max' });
  const lowest = pickFirstBest(games, { metric: g => g.score, prefer: 'min' });
  const decided = games.filter(g => g.score !== g.opponentScore);
  const biggest = pickFirstBest(
    decided.filter(g => g.won),
    { metric: g => g.margin, prefer: 'max' }
  );
  const closest = pickFirstBest(decided, { metric: g => g.margin, prefer: 'min' });
  if (!highest || !lowest) throw new InsufficientDataError(`No weekly game data for week ${week}`);
  if (!biggest || !closest)
    throw new InsufficientDataError(`No decided games in week ${week} weekly game data`);

  const results = [
    teamChallenge('Highest Score This Week', week, highest, highest.score),
    teamChallenge('Lowest Score This Week', week, lowest, lowest.score),
    teamChallenge('Biggest Win This Week', week, biggest, biggest.margin, { margin: biggest.margin }),
    teamChallenge('Closest Game This Week', week, closest, closest.margin, { margin: closest.margin }),
  ];

  if (!hasStarterProjections(games)) return results;

  const diff = (g: WeeklyGameResult) => g.trueProjectionDiff ?? 0;
  const over = pickFirstBest(games, { metric: diff, prefer: 'max' });
  const under = pickFirstBest(games, { metric: diff, prefer: 'min' });
  if (over && under) {
    const projection = (g: WeeklyGameResult) => ({
      starterProjectedScore: g.starterProjectedScore,
      projectedScore: g.projectedScore,
      trueProjectionDiff: g.trueProjectionDiff,
    });
    results.push(teamChallenge('Overachiever', week, over, diff(over), projection(over)));
    results.push(teamChallenge('Below Expectations', week, under, diff(under), projection(under)));
  }
  return results;
}

/** Top scorer across all starters, then the best starter at each position present. */
export function calculatePlayerChallenges(
  players: readonly WeeklyPlayerStats[],
  week: number
): WeeklyChallenge[] {
  requireWeek(week);
  const top = pickFirstBest(players, { metric: p => p.points, prefer: 'max' });
  if (!top) throw new InsufficientDataError(`No weekly player data for week ${week}`);

  const results = [playerChallenge('Top Scorer (Player)', week, top)];
  for (const position of POSITIONS) {
    const best = pickFirstBest(
      players.filter(p => p.position === position),
      { metric: p => p.points, prefer: 'max' }
    );
    if (best) results.push(playerChallenge(`Best ${position}`, week, best));
  }
  return results;
}

export function calculateWeeklyChallenges(
  games: readonly WeeklyGameResult[],
  players: readonly WeeklyPlayerStats[],
  week: number
): WeeklyChallenge[] {
  requireWeek(week);
  if (!games.length) throw new InsufficientDataError(`No weekly game data for week ${week}`);
  if (!players.length) throw new InsufficientDataError(`No weekly player data for week ${week}`);
  return [...calculateTeamChallenges(games, week), ...calculatePlayerChallenges(players, week)];
}
