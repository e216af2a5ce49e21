import type {
  ChampionshipLeaderboard,
  DivisionData,
  LeaguePhase,
  LeagueReport,
  PlayoffBracket,
  PlayoffPhase,
  WeeklyChallenge,
} from '../../types/index.js';
import { bracketRoundsIn, buildBracket } from './bracket.js';
import { buildChampionshipLeaderboard } from './championship.js';
import { InsufficientDataError } from './errors.js';
import { detectLeaguePhase } from './playoffPhase.js';
import { calculateSeasonChallenges } from './seasonChallenges.js';
import { buildSeasonSummary } from './seasonSummary.js';
import { calculateWeeklyChallenges } from './weeklyChallenges.js';

const CHALLENGE_PHASES: readonly PlayoffPhase[] = ['RegularSeason', 'Semifinal', 'Final'];

/** Week the divisions were loaded for; every division must agree. */
export function analysedWeek(divisions: readonly DivisionData[]): number {
  if (!divisions.length) throw new InsufficientDataError('No division data provided');
  const [first] = divisions;
  const other = divisions.find(d => d.week !== first.week);
  if (other)
    throw new InsufficientDataError(
      `Divisions were loaded for different weeks: ${first.name} week ${first.week}, ${other.name} week ${other.week}`,
      { division: other.name }
    );
  return first.week;
}

export function weeklyChallengesFor(divisions: readonly DivisionData[]): WeeklyChallenge[] {
  const week = analysedWeek(divisions);
  return calculateWeeklyChallenges(
    divisions.flatMap(d => d.weeklyGames),
    divisions.flatMap(d => d.weeklyPlayers),
    week
  );
}

/** Brackets visible in a phase, round by round, each round listing every division. */
export function bracketsFor(phase: PlayoffPhase, divisions: readonly DivisionData[]): PlayoffBracket[] {
  return bracketRoundsIn(phase).flatMap(round => divisions.map(d => buildBracket(round, d)));
}

export interface ReportOptions {
  /** Season year for the end-of-season summary; defaults to the current year. */
  seasonYear?: number;
  now?: Date;
}

/**
 * Classifies the league, then computes what that phase shows: challenges
 * through the Final, brackets from the Semifinal on, the championship
 * leaderboard once the bracket rounds are over, and the season summary once
 * championship week is done.
 */
export function buildLeagueReport(
  divisions: readonly DivisionData[],
  options: ReportOptions = {}
): LeagueReport {
  const phase: LeaguePhase = detectLeaguePhase(divisions);
  const withChallenges = CHALLENGE_PHASES.includes(phase.phase);
  const seasonSummary =
    phase.phase === 'Complete'
      ? buildSeasonSummary(divisions, {
          year: options.seasonYear ?? new Date().getFullYear(),
          now: options.now,
        })
      : null;
  let championship: ChampionshipLeaderboard | null = null;
  if (seasonSummary) championship = seasonSummary.championship;
  else if (phase.phase === 'ChampionshipWeek') championship = buildChampionshipLeaderboard(divisions);
  return Object.freeze({
    phase,
    seasonChallenges: withChallenges ? calculateSeasonChallenges(divisions) : [],
    weeklyChallenges: withChallenges ? weeklyChallengesFor(divisions) : [],
    brackets: bracketsFor(phase.phase, divisions),
    championship,
    seasonSummary,
  });
}
