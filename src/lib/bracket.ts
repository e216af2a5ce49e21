import type {
  BracketRound,
  DivisionData,
  PlayoffBracket,
  PlayoffMatchup,
  PlayoffPhase,
  SeededTeam,
  TeamStats,
} from '../../types/index.js';
import { InsufficientDataError } from './errors.js';
import { idify } from './ids.js';
import { createPlayoffBracket, createPlayoffMatchup, isMatchupComplete } from './models.js';

export const PLAYOFF_TEAMS = 4;

/** Bracket rounds that have started by the given phase. */
export function bracketRoundsIn(phase: PlayoffPhase): BracketRound[] {
  if (phase === 'RegularSeason') return [];
  if (phase === 'Semifinal') return ['Semifinal'];
  return ['Semifinal', 'Final'];
}

/**
 * Orders teams by final regular-season standing. Teams without a reported
 * standing follow those with one, ranked by wins desc, points-for desc, then
 * name asc so the result never depends on input order.
 */
export function seedTeams(teams: readonly TeamStats[]): SeededTeam[] {
  const sorted = [...teams].sort((a, b) => {
    if (a.standing !== undefined && b.standing !== undefined) return a.standing - b.standing;
    if (a.standing !== undefined) return -1;
    if (b.standing !== undefined) return 1;
    if (a.wins !== b.wins) return b.wins - a.wins;
    if (a.pointsFor !== b.pointsFor) return b.pointsFor - a.pointsFor;
    return a.name.localeCompare(b.name);
  });
  return sorted.map((team, i) => ({ seed: i + 1, team }));
}

function playedScores(
  division: DivisionData,
  week: number,
  a: string,
  b: string
): { scoreA: number | null; scoreB: number | null } {
  const m = division.matchups.find(
    x =>
      x.week === week &&
      x.bracket !== 'CONSOLATION' &&
      ((x.homeTeam === a && x.awayTeam === b) || (x.homeTeam === b && x.awayTeam === a))
  );
  if (!m || !isMatchupComplete(m)) return { scoreA: null, scoreB: null };
  return m.homeTeam === a
    ? { scoreA: m.homeScore, scoreB: m.awayScore }
    : { scoreA: m.awayScore, scoreB: m.homeScore };
}

function buildMatchup(
  division: DivisionData,
  week: number,
  matchupId: string,
  roundName: string,
  high: SeededTeam,
  low: SeededTeam
): PlayoffMatchup {
  const { scoreA, scoreB } = playedScores(division, week, high.team.name, low.team.name);
  let winner: SeededTeam | null = null;
  if (scoreA !== null && scoreB !== null) {
    // exact tie goes to the better seed
    winner = scoreB > scoreA ? low : high;
  }
  return createPlayoffMatchup({
    matchupId,
    roundName,
    division: division.name,
    seed1: high.seed,
    team1: high.team.name,
    owner1: high.team.owner,
    score1: scoreA,
    seed2: low.seed,
    team2: low.team.name,
    owner2: low.team.owner,
    score2: scoreB,
    winner: winner ? winner.team.name : null,
    winnerSeed: winner ? winner.seed : null,
  });
}

function winnerOf(m: PlayoffMatchup, seeds: readonly SeededTeam[]): SeededTeam | null {
  if (m.winner === null) return null;
  return seeds.find(s => s.team.name === m.winner) ?? null;
}

/**
 * Semifinal pairs seeds 1v4 and 2v3 in the first week after the regular
 * season; the Final pairs the semifinal winners a week later. Unplayed games
 * carry null scores and no winner.
 */
export function buildBracket(round: BracketRound, division: DivisionData): PlayoffBracket {
  if (division.teams.length < PLAYOFF_TEAMS)
    throw new InsufficientDataError(
      `${division.name} has ${division.teams.length} team(s); a bracket needs ${PLAYOFF_TEAMS}`,
      { division: division.name }
    );
  const seeds = seedTeams(division.teams).slice(0, PLAYOFF_TEAMS);
  const [s1, s2, s3, s4] = seeds;
  const slug = idify(division.name);
  const semifinalWeek = division.settings.regularSeasonLength + 1;
  const semis = [
    buildMatchup(division, semifinalWeek, `${slug}_sf1`, 'Semifinal 1', s1, s4),
    buildMatchup(division, semifinalWeek, `${slug}_sf2`, 'Semifinal 2', s2, s3),
  ];
  if (round === 'Semifinal')
    return createPlayoffBracket({ round, week: semifinalWeek, division: division.name, matchups: semis });

  const w1 = winnerOf(semis[0], seeds);
  const w2 = winnerOf(semis[1], seeds);
  if (!w1 || !w2)
    throw new InsufficientDataError(
      `Semifinal results are incomplete in ${division.name}; the Final cannot be seeded`,
      { division: division.name }
    );
  const [high, low] = w1.seed < w2.seed ? [w1, w2] : [w2, w1];
  const finalWeek = semifinalWeek + 1;
  return createPlayoffBracket({
    round,
    week: finalWeek,
    division: division.name,
    matchups: [buildMatchup(division, finalWeek, `${slug}_final`, 'Final', high, low)],
  });
}
