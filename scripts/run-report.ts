import 'dotenv/config';
import { loadConfig } from '../src/lib/config.js';
import { FORMATTERS, formatterFor, type ReportFormatter } from '../src/lib/formatters.js';
import { configuredSource, createApolloServer } from '../src/server.js';

interface Options {
  week?: number;
  formatter: ReportFormatter;
  recap: boolean;
  force: boolean;
}

function printHelp(): void {
  console.log(`Usage: npm run report -- [options]

Options:
  --week=<n>         Analyse week n (1-18) instead of the detected week
  --format=<name>    Output format: ${FORMATTERS.map(f => f.name).join(', ')} (default: json)
  --recap            Print the end-of-season summary instead of the weekly report
  --force            With --recap, summarise a season that is still being played

Environment:
  DATA_DIR, USE_CSV, DIVISIONS, WEEK, SEASON_YEAR   see .env.example

Examples:
  npm run report
  npm run report -- --week=12 --format=compact
  npm run report -- --recap --force
`);
}

function parseArgs(argv: string[]): Options {
  const options: Options = { formatter: FORMATTERS[0], recap: false, force: false };
  for (const arg of argv) {
    if (arg === '--help' || arg === '-h') {
      printHelp();
      process.exit(0);
    }
    if (arg === '--recap') {
      options.recap = true;
      continue;
    }
    if (arg === '--force') {
      options.force = true;
      continue;
    }

    const [key, rawValue] = arg.split('=');
    if (!rawValue) continue;

    switch (key) {
      case '--week': {
        const parsed = Number.parseInt(rawValue, 10);
        if (Number.isNaN(parsed) || parsed < 1 || parsed > 18) {
          console.warn(`Ignoring invalid week: "${rawValue}"`);
        } else {
          options.week = parsed;
        }
        break;
      }
      case '--format': {
        const formatter = formatterFor(rawValue);
        if (!formatter) {
          console.warn(`Ignoring unknown format: "${rawValue}"`);
        } else {
          options.formatter = formatter;
        }
        break;
      }
      default:
        console.warn(`Unrecognized option: "${key}". Run with --help to see supported flags.`);
        break;
    }
  }
  return options;
}

const options = parseArgs(process.argv.slice(2));
const config = loadConfig();

const server = createApolloServer(
  configuredSource(options.week !== undefined ? { ...config, week: options.week } : config),
  { seasonYear: config.seasonYear }
);
await server.start();

const championshipFields = `
  week
  entries { rank team owner division score projectedScore isChampion }
  progress { status gamesCompleted totalGames completionPct }
  rosters { team division totalScore emptySlots warnings validation { errors warnings } }
`;

const bracketFields = `
  round
  week
  division
  matchups { matchupId roundName seed1 team1 score1 seed2 team2 score2 winner winnerSeed }
`;

const reportQuery = `#graphql
  query LeagueReport {
    leagueReport {
      phase { phase week divisions { division phase week nominalWeek } }
      seasonChallenges { challengeName winner owner division value context }
      weeklyChallenges { challengeName challengeType week winner division value context }
      brackets { ${bracketFields} }
      championship { ${championshipFields} }
      seasonSummary { year status divisionChampions { division team owner wins losses ties winPercentage } }
    }
  }
`;

const recapQuery = `#graphql
  query SeasonSummary($force: Boolean) {
    seasonSummary(force: $force) {
      year
      generatedAt
      status
      phase
      structure { regularSeasonStart regularSeasonEnd playoffStart playoffEnd championshipWeek playoffRounds }
      divisionChampions { division team owner wins losses ties pointsFor pointsAgainst winPercentage }
      seasonChallenges { challengeName winner owner division value context }
      playoffs { round week brackets { ${bracketFields} } }
      championship { ${championshipFields} }
    }
  }
`;

const result = await server.executeOperation({
  query: options.recap ? recapQuery : reportQuery,
  variables: options.recap ? { force: options.force } : undefined,
});

await server.stop();

if (result.body.kind !== 'single') {
  throw new Error('Expected a single GraphQL response body');
}

const { data, errors } = result.body.singleResult;
if (errors?.length) {
  console.error('GraphQL errors:\n', errors);
  process.exitCode = 1;
} else {
  if (options.recap && options.force) console.warn('Summarising a season that may still be in progress (--force)');
  console.log(options.formatter.format(options.recap ? data?.seasonSummary : data?.leagueReport));
}
