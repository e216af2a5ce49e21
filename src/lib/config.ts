import path from 'node:path';
import { ConfigurationError } from './errors.js';
import { envSchema } from './schemas.js';

export interface AppConfig {
  dataDir: string;
  useCsv: boolean;
  seasonYear: number;
  week?: number;
  divisions: string[];
  port: number;
}

const DEFAULT_PORT = 4100;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const keys = [...new Set(parsed.error.issues.map(i => i.path.join('.')))];
    const detail = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigurationError(`Invalid configuration for ${keys.join(', ')} (${detail})`);
  }
  const e = parsed.data;
  return {
    dataDir: path.resolve(process.cwd(), e.DATA_DIR),
    useCsv: e.USE_CSV,
    seasonYear: e.SEASON_YEAR ?? new Date().getFullYear(),
    ...(e.WEEK !== undefined ? { week: e.WEEK } : {}),
    divisions: e.DIVISIONS,
    port: e.APOLLO_PORT ?? DEFAULT_PORT,
  };
}
