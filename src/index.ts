import 'dotenv/config';
import { startStandaloneServer } from '@apollo/server/standalone';
import { loadConfig } from './lib/config.js';
import { configuredSource, createApolloServer } from './server.js';

const config = loadConfig();
const server = createApolloServer(configuredSource(config), { seasonYear: config.seasonYear });

const { url } = await startStandaloneServer(server, {
  listen: { port: config.port },
});
console.log(`🚀 GraphQL ready at ${url} (USE_CSV=${config.useCsv ? '1' : '0'}, data=${config.dataDir})`);
