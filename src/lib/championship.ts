import type {
  ChampionshipLeaderboard,
  ChampionshipProgress,
  ChampionshipRoster,
  DivisionData,
  GameStatus,
  RosterSlot,
  SeededTeam,
} from '../../types/index.js';
import { buildBracket, seedTeams } from './bracket.js';
import { InsufficientDataError } from './errors.js';
import {
  createChampionshipEntry,
  createChampionshipLeaderboard,
  createChampionshipProgress,
  createChampionshipRoster,
  createRosterSlot,
  isStarterSlot,
  requireWeek,
} from './models.js';

export const POSITION_ORDER: readonly string[] = [
  'QB',
  'RB',
  'WR',
  'TE',
  'FLEX',
  'RB/WR/TE',
  'K',
  'D/ST',
  'BE',
  'BN',
  'IR',
];

/** Index into POSITION_ORDER; unknown slots sort last. */
export function positionSortKey(slot: string): number {
  const i = POSITION_ORDER.indexOf(slot);
  return i === -1 ? POSITION_ORDER.length : i;
}

/**
 * The provider exposes no live game state once the league is complete, so
 * status is inferred from points and projection:
 *   - any nonzero points: the player has played ("final")
 *   - zero points, zero projection: ruled out before kickoff ("final")
 *   - zero points, positive projection: "not_started"
 * A game in progress with points on the board is indistinguishable from a
 * finished one and reports "final".
 */
export function inferGameStatus(points: number, projected: number): GameStatus {
  if (points !== 0) return 'final';
  if (projected === 0) return 'final';
  return 'not_started';
}

export function championshipWeekOf(division: DivisionData): number {
  return division.settings.regularSeasonLength + 3;
}

/** Winner of the division's Final bracket, with the seed they carried into it. */
export function findDivisionWinner(division: DivisionData): SeededTeam {
  const [final] = buildBracket('Final', division).matchups;
  if (final.winner === null)
    throw new InsufficientDataError(`The Final in ${division.name} has not been decided`, {
      division: division.name,
    });
  const winner = seedTeams(division.teams).find(s => s.team.name === final.winner);
  if (!winner)
    throw new InsufficientDataError(`Final winner ${final.winner} is not a team in ${division.name}`, {
      division: division.name,
    });
  return winner;
}

/**
 * Sums a team's championship score from its roster entries for `week`. There
 * is no native matchup for this round, so each starter's recorded points are
 * added up directly.
 */
export function resolveChampionshipRoster(
  division: DivisionData,
  winner: SeededTeam,
  week: number
): ChampionshipRoster {
  requireWeek(week);
  const entries = division.rosters.filter(r => r.team === winner.team.name && r.week === week);
  if (!entries.length)
    throw new InsufficientDataError(`No roster entries for ${winner.team.name} in week ${week}`, {
      division: division.name,
    });

  const slots: RosterSlot[] = entries.map(e =>
    createRosterSlot({
      slot: e.lineupSlot,
      playerName: e.playerName,
      proTeam: e.proTeam || null,
      projectedPoints: e.projectedPoints,
      points: e.points,
      gameStatus: inferGameStatus(e.points, e.projectedPoints),
      injuryStatus: e.injuryStatus,
      onBye: e.onBye,
      isStarter: isStarterSlot(e.lineupSlot),
    })
  );
  const ordered = [...slots].sort((a, b) => positionSortKey(a.slot) - positionSortKey(b.slot));

  return createChampionshipRoster({
    team: winner.team.name,
    owner: winner.team.owner,
    division: division.name,
    seed: winner.seed,
    week,
    starters: ordered.filter(s => s.isStarter),
    bench: ordered.filter(s => !s.isStarter),
  });
}

/** Share of starters whose game status reads "final". */
export function championshipProgress(rosters: readonly ChampionshipRoster[]): ChampionshipProgress {
  let total = 0;
  let completed = 0;
  for (const roster of rosters)
    for (const slot of roster.starters) {
      total += 1;
      if (slot.gameStatus === 'final') completed += 1;
    }
  if (!total) throw new InsufficientDataError('No championship starters to track');
  return createChampionshipProgress({ gamesCompleted: completed, totalGames: total });
}

/**
 * Ranks every division winner by synthesized championship score, highest
 * first; equal scores are ordered by division name. Rank 1 is the champion.
 */
export function buildChampionshipLeaderboard(
  divisions: readonly DivisionData[],
  week?: number
): ChampionshipLeaderboard {
  if (!divisions.length) throw new InsufficientDataError('No division data provided');
  const targetWeek = week ?? championshipWeekOf(divisions[0]);

  const rosters = divisions.map(d => resolveChampionshipRoster(d, findDivisionWinner(d), targetWeek));
  const ranked = [...rosters].sort((a, b) => {
    if (a.totalScore !== b.totalScore) return b.totalScore - a.totalScore;
    if (a.division < b.division) return -1;
    return a.division > b.division ? 1 : 0;
  });

  const entries = ranked.map((r, i) =>
    createChampionshipEntry({
      rank: i + 1,
      team: r.team,
      owner: r.owner,
      division: r.division,
      score: r.totalScore,
      projectedScore: r.projectedScore,
      isChampion: i === 0,
    })
  );

  return createChampionshipLeaderboard({
    week: targetWeek,
    entries,
    rosters: ranked,
    progress: championshipProgress(ranked),
  });
}

export interface RosterValidation {
  errors: string[];
  warnings: string[];
}

export function validateRoster(roster: ChampionshipRoster): RosterValidation {
  const errors: string[] = [];
  const warnings: string[] = [];
  if (roster.emptySlots.length) errors.push(`Empty starting slots: ${roster.emptySlots.join(', ')}`);
  for (const s of roster.starters) {
    if (s.injuryStatus === 'OUT' || s.injuryStatus === 'DOUBTFUL')
      errors.push(`${s.slot} ${s.playerName} is ${s.injuryStatus}`);
    if (s.injuryStatus === 'QUESTIONABLE') warnings.push(`${s.slot} ${s.playerName} is QUESTIONABLE`);
    if (s.onBye) errors.push(`${s.slot} ${s.playerName} is on BYE week`);
    if (s.playerName && s.projectedPoints === 0)
      warnings.push(`${s.slot} ${s.playerName} has 0.0 projected points`);
  }
  return { errors, warnings };
}
