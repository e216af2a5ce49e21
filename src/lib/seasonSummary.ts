import type {
  DivisionChampion,
  DivisionData,
  LeaguePhase,
  PlayoffRoundSummary,
  SeasonStatus,
  SeasonStructure,
  SeasonSummary,
} from '../../types/index.js';
import { bracketRoundsIn, buildBracket, seedTeams } from './bracket.js';
import { buildChampionshipLeaderboard } from './championship.js';
import { DataValidationError, InsufficientDataError, SeasonIncompleteError } from './errors.js';
import {
  createDivisionChampion,
  createPlayoffRoundSummary,
  createSeasonStructure,
  createSeasonSummary,
} from './models.js';
import { detectLeaguePhase } from './playoffPhase.js';
import { calculateSeasonChallenges } from './seasonChallenges.js';

export interface SeasonSummaryOptions {
  year: number;
  /** Summarise whatever has been played instead of requiring a finished season. */
  force?: boolean;
  now?: Date;
}

/** Shared week boundaries; every division must run the same calendar. */
export function seasonStructureOf(divisions: readonly DivisionData[]): SeasonStructure {
  if (!divisions.length) throw new InsufficientDataError('No division data provided');
  const [first] = divisions;
  const other = divisions.find(
    d => d.settings.regularSeasonLength !== first.settings.regularSeasonLength
  );
  if (other)
    throw new DataValidationError(
      `Divisions use different regular seasons: ${first.name} has ${first.settings.regularSeasonLength} weeks, ${other.name} has ${other.settings.regularSeasonLength}`,
      { division: other.name }
    );
  return createSeasonStructure(first.settings);
}

/** Top seed at the end of the regular season. */
export function divisionChampion(division: DivisionData): DivisionChampion {
  const [top] = seedTeams(division.teams);
  if (!top)
    throw new InsufficientDataError(`${division.name} has no teams`, { division: division.name });
  return createDivisionChampion(top.team);
}

/**
 * 'complete' once championship week is over. Anything earlier throws
 * SeasonIncompleteError unless `force` is set, in which case it is 'partial'.
 */
export function seasonStatus(
  phase: LeaguePhase,
  structure: SeasonStructure,
  force = false
): SeasonStatus {
  if (phase.phase === 'Complete') return 'complete';
  if (force) return 'partial';
  let where: string;
  switch (phase.phase) {
    case 'RegularSeason':
      where = `Season incomplete: currently in regular season week ${phase.week}`;
      break;
    case 'Semifinal':
    case 'Final':
      where = `Season incomplete: currently in the ${phase.phase} (week ${phase.week})`;
      break;
    default:
      where = `Championship week in progress (week ${phase.week})`;
  }
  throw new SeasonIncompleteError(
    `${where}. Championship week is ${structure.championshipWeek}.`,
    phase.week,
    structure.championshipWeek
  );
}

function playoffRounds(phase: LeaguePhase, divisions: readonly DivisionData[]): PlayoffRoundSummary[] {
  return bracketRoundsIn(phase.phase).map(round => {
    const brackets = divisions.map(d => buildBracket(round, d));
    return createPlayoffRoundSummary({ round, week: brackets[0].week, brackets });
  });
}

/**
 * End-of-season recap: regular-season division champions, the five season
 * awards, both playoff rounds and the championship leaderboard. With `force`
 * an unfinished season is summarised as far as it has been played.
 */
export function buildSeasonSummary(
  divisions: readonly DivisionData[],
  options: SeasonSummaryOptions
): SeasonSummary {
  const structure = seasonStructureOf(divisions);
  const phase = detectLeaguePhase(divisions);
  const status = seasonStatus(phase, structure, options.force);
  const championship =
    phase.phase === 'ChampionshipWeek' || phase.phase === 'Complete'
      ? buildChampionshipLeaderboard(divisions, structure.championshipWeek)
      : null;

  return createSeasonSummary({
    year: options.year,
    generatedAt: (options.now ?? new Date()).toISOString(),
    status,
    phase: phase.phase,
    structure,
    divisionChampions: divisions.map(divisionChampion),
    seasonChallenges: calculateSeasonChallenges(divisions),
    playoffs: playoffRounds(phase, divisions),
    championship,
  });
}
