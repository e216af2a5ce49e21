import fs from 'node:fs';
import path from 'node:path';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type {
  DivisionData,
  GameResult,
  Matchup,
  RosterEntry,
  WeeklyGameResult,
  WeeklyPlayerStats,
} from '../../types/index.js';
import { ConfigurationError, DataValidationError, InsufficientDataError } from './errors.js';
import { roundPoints } from './ids.js';
import {
  createDivisionData,
  createGameResult,
  createLeagueSettings,
  createMatchup,
  createRosterEntry,
  createTeamStats,
  createWeeklyGameResult,
  createWeeklyPlayerStats,
  isPosition,
  isStarterSlot,
} from './models.js';
import { resolveEffectiveWeek } from './playoffPhase.js';
import { rawDivisionSchema, type RawDivision, type RawPlayer } from './schemas.js';

export interface LoadOptions {
  /** Analyse this week instead of the detected one. */
  week?: number;
  /** Keep only these divisions, in this order. */
  divisions?: readonly string[];
}

export function parseRawDivision(input: unknown, source: string): RawDivision {
  const parsed = rawDivisionSchema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new DataValidationError(`Invalid division data in ${source}: ${detail}`);
  }
  return parsed.data;
}

function starterLines(raw: RawDivision, week: number, team: string): RawPlayer[] {
  return raw.players.filter(p => p.week === week && p.team === team && isStarterSlot(p.lineupSlot));
}

function starterProjection(raw: RawDivision, week: number, team: string): number | null {
  const lines = starterLines(raw, week, team);
  if (!lines.length) return null;
  return roundPoints(lines.reduce((acc, p) => acc + p.projectedPoints, 0));
}

function hasBothScores(m: Matchup): m is Matchup & { homeScore: number; awayScore: number } {
  return m.homeScore !== null && m.awayScore !== null;
}

/**
 * Maps one provider export onto the engine's records. Regular-season results
 * skip any matchup where a side is unscored or scored zero; weekly records
 * cover the analysed week only.
 */
export function toDivisionData(raw: RawDivision, options: { week?: number } = {}): DivisionData {
  const division = raw.name;
  const settings = createLeagueSettings({
    currentWeek: raw.currentWeek,
    regularSeasonLength: raw.regularSeasonLength,
    playoffRoundCount: raw.playoffRoundCount,
  });
  const matchups = raw.matchups.map(m =>
    createMatchup({
      division,
      week: m.week,
      homeTeam: m.home,
      awayTeam: m.away,
      homeScore: m.homeScore,
      awayScore: m.awayScore,
      homeProjected: m.homeProjected,
      awayProjected: m.awayProjected,
      bracket: m.bracket,
    })
  );
  const effectiveWeek = resolveEffectiveWeek(settings, matchups);
  const week = options.week ?? effectiveWeek;

  const lastRegular = Math.min(effectiveWeek, settings.regularSeasonLength);
  const games: GameResult[] = [];
  let skipped = 0;
  for (const m of matchups) {
    if (m.week > lastRegular) continue;
    if (!hasBothScores(m) || m.homeScore === 0 || m.awayScore === 0) {
      skipped += 1;
      continue;
    }
    games.push(
      createGameResult({
        division,
        week: m.week,
        homeTeam: m.homeTeam,
        awayTeam: m.awayTeam,
        homeScore: m.homeScore,
        awayScore: m.awayScore,
      })
    );
  }
  if (skipped) console.warn(`Skipped ${skipped} unscored matchup(s) in ${division}`);

  const weeklyGames: WeeklyGameResult[] = matchups
    .filter(m => m.week === week)
    .filter(hasBothScores)
    .flatMap(m => [
      createWeeklyGameResult({
        division,
        week,
        team: m.homeTeam,
        opponent: m.awayTeam,
        score: m.homeScore,
        opponentScore: m.awayScore,
        projectedScore: m.homeProjected ?? 0,
        starterProjectedScore: starterProjection(raw, week, m.homeTeam),
      }),
      createWeeklyGameResult({
        division,
        week,
        team: m.awayTeam,
        opponent: m.homeTeam,
        score: m.awayScore,
        opponentScore: m.homeScore,
        projectedScore: m.awayProjected ?? 0,
        starterProjectedScore: starterProjection(raw, week, m.awayTeam),
      }),
    ]);

  const weeklyPlayers: WeeklyPlayerStats[] = raw.players
    .filter(p => p.week === week && isStarterSlot(p.lineupSlot) && isPosition(p.position))
    .map(p =>
      createWeeklyPlayerStats({
        division,
        week,
        name: p.name,
        position: p.position,
        team: p.team,
        proTeam: p.proTeam,
        points: p.points,
        projectedPoints: p.projectedPoints,
      })
    );

  const rosters: RosterEntry[] = raw.players.map(p =>
    createRosterEntry({
      division,
      week: p.week,
      team: p.team,
      playerName: p.name,
      position: p.position,
      lineupSlot: p.lineupSlot,
      proTeam: p.proTeam,
      points: p.points,
      projectedPoints: p.projectedPoints,
      injuryStatus: p.injuryStatus ?? null,
      onBye: p.onBye,
    })
  );

  return createDivisionData({
    leagueId: raw.leagueId,
    name: division,
    settings,
    week,
    teams: raw.teams.map(t => createTeamStats({ ...t, division })),
    games,
    matchups,
    weeklyGames,
    weeklyPlayers,
    rosters,
  });
}

/** Restricts and reorders divisions by name; unknown names are a configuration error. */
export function selectDivisions<T extends { name: string }>(all: readonly T[], names: readonly string[]): T[] {
  if (!names.length) return [...all];
  return names.map(name => {
    const match = all.find(d => d.name === name);
    if (!match)
      throw new ConfigurationError(
        `Unknown division "${name}"; available: ${all.map(d => d.name).join(', ')}`
      );
    return match;
  });
}

function requireDir(dir: string): void {
  if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory())
    throw new ConfigurationError(`Data directory not found: ${dir}`);
}

function finish(raws: RawDivision[], dir: string, options: LoadOptions): DivisionData[] {
  if (!raws.length) throw new InsufficientDataError(`No division data found in ${dir}`);
  const divisions = selectDivisions(raws, options.divisions ?? []).map(r =>
    toDivisionData(r, { week: options.week })
  );
  console.log(`Loaded ${divisions.length} division(s) from ${dir}`);
  return divisions;
}

/** Reads every *.json file in `dir` (sorted by file name) as one division. */
export function loadFromJSON(dir: string, options: LoadOptions = {}): DivisionData[] {
  requireDir(dir);
  const files = fs
    .readdirSync(dir)
    .filter(f => f.endsWith('.json'))
    .sort();
  const raws = files.map(f => {
    const file = path.join(dir, f);
    let json: unknown;
    try {
      json = JSON.parse(fs.readFileSync(file, 'utf-8'));
    } catch (err) {
      throw new DataValidationError(`Could not parse ${file}: ${err instanceof Error ? err.message : String(err)}`);
    }
    return parseRawDivision(json, file);
  });
  return finish(raws, dir, options);
}

const csvRows = z.array(z.record(z.string()));
type CsvRow = Record<string, string>;

function readCsv(file: string): CsvRow[] {
  if (!fs.existsSync(file)) throw new ConfigurationError(`Missing CSV file: ${file}`);
  const rows: unknown = parse(fs.readFileSync(file, 'utf-8'), {
    columns: true,
    skip_empty_lines: true,
    trim: true,
  });
  return csvRows.parse(rows);
}

const text = (v: string | undefined) => (v ? v : undefined);
const num = (v: string | undefined) => (v ? Number(v) : undefined);
const nullableNum = (v: string | undefined) => (v ? Number(v) : null);
const bool = (v: string | undefined) => v === 'true' || v === '1';

/**
 * Reads divisions.csv, teams.csv, matchups.csv and players.csv from `dir`.
 * Every row past divisions.csv names its division in a `division` column.
 */
export function loadFromCSV(dir: string, options: LoadOptions = {}): DivisionData[] {
  requireDir(dir);
  const divisionRows = readCsv(path.join(dir, 'divisions.csv'));
  const teamRows = readCsv(path.join(dir, 'teams.csv'));
  const matchupRows = readCsv(path.join(dir, 'matchups.csv'));
  const playerRows = readCsv(path.join(dir, 'players.csv'));

  const raws = divisionRows.map(r => {
    const name = r.name;
    const mine = (rows: CsvRow[]) => rows.filter(row => row.division === name);
    return parseRawDivision(
      {
        leagueId: num(r.leagueId),
        name,
        currentWeek: num(r.currentWeek),
        regularSeasonLength: num(r.regularSeasonLength),
        playoffRoundCount: num(r.playoffRoundCount),
        teams: mine(teamRows).map(t => ({
          id: text(t.id),
          name: t.name,
          owner: t.owner,
          wins: num(t.wins),
          losses: num(t.losses),
          ties: num(t.ties),
          pointsFor: num(t.pointsFor),
          pointsAgainst: num(t.pointsAgainst),
          standing: num(t.standing),
        })),
        matchups: mine(matchupRows).map(m => ({
          week: num(m.week),
          home: m.home,
          away: m.away,
          homeScore: nullableNum(m.homeScore),
          awayScore: nullableNum(m.awayScore),
          homeProjected: nullableNum(m.homeProjected),
          awayProjected: nullableNum(m.awayProjected),
          bracket: text(m.bracket),
        })),
        players: mine(playerRows).map(p => ({
          week: num(p.week),
          team: p.team,
          name: p.name,
          position: p.position,
          lineupSlot: p.lineupSlot,
          proTeam: p.proTeam ?? '',
          points: num(p.points),
          projectedPoints: num(p.projectedPoints),
          injuryStatus: text(p.injuryStatus) ?? null,
          onBye: bool(p.onBye),
        })),
      },
      path.join(dir, 'divisions.csv')
    );
  });
  return finish(raws, dir, options);
}
