import { z } from 'zod';

const score = z.number().finite().nonnegative();

export const rawTeamSchema = z.object({
  id: z.string().trim().min(1).optional(),
  name: z.string().trim().min(1),
  owner: z.string().trim().min(1),
  wins: z.number().int().nonnegative(),
  losses: z.number().int().nonnegative(),
  ties: z.number().int().nonnegative().default(0),
  pointsFor: score,
  pointsAgainst: score,
  standing: z.number().int().positive().optional(),
});

export const rawMatchupSchema = z.object({
  week: z.number().int().min(1).max(18),
  home: z.string().trim().min(1),
  away: z.string().trim().min(1),
  homeScore: score.nullable(),
  awayScore: score.nullable(),
  homeProjected: score.nullable().optional(),
  awayProjected: score.nullable().optional(),
  bracket: z.enum(['WINNERS', 'CONSOLATION', 'NONE']).default('NONE'),
});

export const rawPlayerSchema = z.object({
  week: z.number().int().min(1).max(18),
  team: z.string().trim().min(1),
  name: z.string().trim().min(1),
  position: z.string().trim().min(1),
  lineupSlot: z.string().trim().min(1),
  proTeam: z.string().default(''),
  points: z.number().finite(),
  projectedPoints: score,
  injuryStatus: z.string().nullable().optional(),
  onBye: z.boolean().default(false),
});

/** One division as exported by the fantasy provider. */
export const rawDivisionSchema = z.object({
  leagueId: z.number().int().positive(),
  name: z.string().trim().min(1),
  currentWeek: z.number().int().min(1).max(18),
  regularSeasonLength: z.number().int().min(1).max(18),
  playoffRoundCount: z.number().int().positive().default(2),
  teams: z.array(rawTeamSchema),
  matchups: z.array(rawMatchupSchema).default([]),
  players: z.array(rawPlayerSchema).default([]),
});

export type RawTeam = z.infer<typeof rawTeamSchema>;
export type RawMatchup = z.infer<typeof rawMatchupSchema>;
export type RawPlayer = z.infer<typeof rawPlayerSchema>;
export type RawDivision = z.infer<typeof rawDivisionSchema>;

const flag = z
  .string()
  .optional()
  .transform(v => v === '1');

const optionalInt = (min: number, max: number) =>
  z
    .string()
    .trim()
    .optional()
    .transform(v => (v ? Number(v) : undefined))
    .refine(v => v === undefined || (Number.isInteger(v) && v >= min && v <= max), {
      message: `must be an integer between ${min} and ${max}`,
    });

export const envSchema = z.object({
  DATA_DIR: z.string().trim().min(1).default('src/data/divisions'),
  USE_CSV: flag,
  SEASON_YEAR: optionalInt(2000, 2100),
  WEEK: optionalInt(1, 18),
  DIVISIONS: z
    .string()
    .optional()
    .transform(v =>
      (v ?? '')
        .split(',')
        .map(s => s.trim())
        .filter(Boolean)
    ),
  APOLLO_PORT: optionalInt(1, 65535),
});

