import { describe, it, expect } from 'vitest';
import path from 'node:path';
import { loadConfig } from './config.js';
import { ConfigurationError } from './errors.js';

describe('loadConfig', () => {
  it('should apply defaults to an empty environment', () => {
    expect(loadConfig({})).toEqual({
      dataDir: path.resolve(process.cwd(), 'src/data/divisions'),
      useCsv: false,
      seasonYear: new Date().getFullYear(),
      divisions: [],
      port: 4100,
    });
  });

  it('should parse every supported key', () => {
    const config = loadConfig({
      DATA_DIR: '/srv/league',
      USE_CSV: '1',
      SEASON_YEAR: '2024',
      WEEK: '12',
      DIVISIONS: 'East, West,',
      APOLLO_PORT: '5000',
    });
    expect(config).toEqual({
      dataDir: '/srv/league',
      useCsv: true,
      seasonYear: 2024,
      week: 12,
      divisions: ['East', 'West'],
      port: 5000,
    });
  });

  it('should only enable CSV loading for "1"', () => {
    expect(loadConfig({ USE_CSV: 'yes' }).useCsv).toBe(false);
  });

  it('should reject an out-of-range week', () => {
    expect(() => loadConfig({ WEEK: '19' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ WEEK: '19' })).toThrow(
      'Invalid configuration for WEEK (WEEK: must be an integer between 1 and 18)'
    );
  });

  it('should name every offending key', () => {
    expect(() => loadConfig({ WEEK: 'abc', APOLLO_PORT: '0' })).toThrow('Invalid configuration for WEEK, APOLLO_PORT');
  });
});
