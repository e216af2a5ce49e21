import { ApolloServer } from '@apollo/server';
import fs from 'node:fs';
import path from 'node:path';
import gql from 'graphql-tag';

import type { ChampionshipRoster, DivisionData } from '../types/index.js';
import { buildChampionshipLeaderboard, validateRoster } from './lib/championship.js';
import { loadConfig, type AppConfig } from './lib/config.js';
import { loadFromCSV, loadFromJSON } from './lib/dataLoader.js';
import { JSONObject } from './lib/jsonScalar.js';
import { detectLeaguePhase } from './lib/playoffPhase.js';
import { bracketsFor, buildLeagueReport, weeklyChallengesFor } from './lib/report.js';
import { calculateSeasonChallenges } from './lib/seasonChallenges.js';
import { buildSeasonSummary } from './lib/seasonSummary.js';

/** Supplies the divisions to analyse, optionally for a specific week. */
export type DivisionSource = (week?: number) => readonly DivisionData[];

export function configuredSource(config: AppConfig = loadConfig()): DivisionSource {
  const cache = new Map<number | undefined, readonly DivisionData[]>();
  return week => {
    const key = week ?? config.week;
    const cached = cache.get(key);
    if (cached) return cached;
    const options = { week: key, divisions: config.divisions };
    const loaded = config.useCsv
      ? loadFromCSV(config.dataDir, options)
      : loadFromJSON(config.dataDir, options);
    cache.set(key, loaded);
    return loaded;
  };
}

const typeDefs = gql(fs.readFileSync(path.join(process.cwd(), 'src', 'schema.graphql'), 'utf-8'));

export interface ServerOptions {
  seasonYear?: number;
}

export function createResolvers(source: DivisionSource, options: ServerOptions = {}) {
  const seasonYear = options.seasonYear ?? new Date().getFullYear();
  return {
    JSONObject,
    Query: {
      leagueReport: () => buildLeagueReport(source(), { seasonYear }),
      playoffState: () => detectLeaguePhase(source()),
      seasonChallenges: () => calculateSeasonChallenges(source()),
      weeklyChallenges: (_: unknown, { week }: { week?: number | null }) =>
        weeklyChallengesFor(source(week ?? undefined)),
      playoffBrackets: () => {
        const divisions = source();
        return bracketsFor(detectLeaguePhase(divisions).phase, divisions);
      },
      championship: (_: unknown, { week }: { week?: number | null }) =>
        buildChampionshipLeaderboard(source(), week ?? undefined),
      seasonSummary: (_: unknown, { force }: { force?: boolean | null }) =>
        buildSeasonSummary(source(), { year: seasonYear, force: force ?? false }),
    },
    ChampionshipRoster: {
      validation: (roster: ChampionshipRoster) => validateRoster(roster),
    },
  };
}

export function createApolloServer(
  source: DivisionSource = configuredSource(),
  options: ServerOptions = {}
) {
  return new ApolloServer({
    typeDefs,
    resolvers: createResolvers(source, options),
  });
}
