import type {
  DivisionData,
  LeaguePhase,
  LeagueSettings,
  Matchup,
  PhaseState,
  PlayoffPhase,
} from '../../types/index.js';
import { DivisionSyncError, InsufficientDataError } from './errors.js';
import { isMatchupComplete } from './models.js';

/**
 * Maps a week onto the playoff calendar: the two bracket rounds follow the
 * regular season directly, then one championship week, then the season is over.
 */
export function classifyWeek(week: number, settings: LeagueSettings): PlayoffPhase {
  const offset = week - settings.regularSeasonLength;
  if (offset <= 0) return 'RegularSeason';
  if (offset === 1) return 'Semifinal';
  if (offset === 2) return 'Final';
  if (offset === 3) return 'ChampionshipWeek';
  return 'Complete';
}

/**
 * The provider advances its current week before that week's games are scored.
 * When the nominal week has matchups and any of them is unfinished, report the
 * week before it instead. Weeks without native matchups (championship week)
 * are taken as reported.
 */
export function resolveEffectiveWeek(settings: LeagueSettings, matchups: readonly Matchup[]): number {
  const nominal = settings.currentWeek;
  if (nominal <= 1) return nominal;
  const current = matchups.filter(m => m.week === nominal);
  if (current.length && !current.every(isMatchupComplete)) return nominal - 1;
  return nominal;
}

export function detectDivisionPhase(division: DivisionData): PhaseState {
  const week = resolveEffectiveWeek(division.settings, division.matchups);
  return Object.freeze({
    division: division.name,
    phase: classifyWeek(week, division.settings),
    week,
    nominalWeek: division.settings.currentWeek,
    regularSeasonLength: division.settings.regularSeasonLength,
  });
}

function describe(state: PhaseState): string {
  return `week ${state.week} (${state.phase})`;
}

/**
 * Classifies every division and requires them to agree on both phase and week.
 * The reference state is the one most divisions share (earliest division on a
 * tie); every division that differs from it is named in the DivisionSyncError.
 */
export function detectLeaguePhase(divisions: readonly DivisionData[]): LeaguePhase {
  if (!divisions.length) throw new InsufficientDataError('No division data provided');
  const states = divisions.map(detectDivisionPhase);

  const counts = new Map<string, number>();
  for (const s of states) counts.set(describe(s), (counts.get(describe(s)) ?? 0) + 1);
  let reference = states[0];
  for (const s of states)
    if ((counts.get(describe(s)) ?? 0) > (counts.get(describe(reference)) ?? 0)) reference = s;

  const divergent = states.filter(s => describe(s) !== describe(reference));
  if (divergent.length) {
    const divisionStates: Record<string, string> = {};
    for (const s of states) divisionStates[s.division] = describe(s);
    const names = divergent.map(s => `${s.division} [${describe(s)}]`).join(', ');
    throw new DivisionSyncError(
      `Divisions are out of sync: ${names} differ from ${describe(reference)}`,
      divisionStates,
      divergent[0].division
    );
  }

  return Object.freeze({
    phase: reference.phase,
    week: reference.week,
    divisions: Object.freeze(states),
  });
}
