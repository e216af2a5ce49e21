export const POSITIONS = ['QB', 'RB', 'WR', 'TE', 'K', 'D/ST'] as const;
export type Position = (typeof POSITIONS)[number];

export type PlayoffPhase = 'RegularSeason' | 'Semifinal' | 'Final' | 'ChampionshipWeek' | 'Complete';
export type BracketRound = 'Semifinal' | 'Final';
export type BracketType = 'WINNERS' | 'CONSOLATION' | 'NONE';
export type GameStatus = 'not_started' | 'final';
export type ProgressStatus = 'not_started' | 'in_progress' | 'final';
export type ChallengeType = 'team' | 'player';
export type SeasonStatus = 'complete' | 'partial';

export type ChallengeContext = Readonly<Record<string, string | number | boolean | null>>;

export interface LeagueSettings {
  readonly currentWeek: number;
  readonly regularSeasonLength: number;
  readonly playoffRoundCount: number;
}

export interface TeamStats {
  readonly id: string;
  readonly name: string;
  readonly owner: string;
  readonly division: string;
  readonly wins: number;
  readonly losses: number;
  readonly ties: number;
  readonly pointsFor: number;
  readonly pointsAgainst: number;
  readonly standing?: number;
}

export interface GameResult {
  readonly division: string;
  readonly week: number;
  readonly homeTeam: string;
  readonly awayTeam: string;
  readonly homeScore: number;
  readonly awayScore: number;
  readonly margin: number; // winner - loser, 0 for a tie
}

/** One side of a GameResult seen from that team's perspective. */
export interface TeamGameLine {
  readonly division: string;
  readonly week: number;
  readonly team: string;
  readonly opponent: string;
  readonly score: number;
  readonly opponentScore: number;
  readonly won: boolean;
  readonly margin: number;
}

export interface Matchup {
  readonly division: string;
  readonly week: number;
  readonly homeTeam: string;
  readonly awayTeam: string;
  readonly homeScore: number | null;
  readonly awayScore: number | null;
  readonly homeProjected: number | null;
  readonly awayProjected: number | null;
  readonly bracket: BracketType;
}

export interface WeeklyGameResult {
  readonly division: string;
  readonly week: number;
  readonly team: string;
  readonly opponent: string;
  readonly score: number;
  readonly opponentScore: number;
  readonly projectedScore: number; // provider's live projection
  readonly starterProjectedScore: number | null; // sum of starters' pre-game projections
  readonly won: boolean;
  readonly margin: number;
  readonly projectionDiff: number;
  readonly trueProjectionDiff: number | null;
}

export interface WeeklyPlayerStats {
  readonly division: string;
  readonly week: number;
  readonly name: string;
  readonly position: Position;
  readonly team: string;
  readonly proTeam: string;
  readonly points: number;
  readonly projectedPoints: number;
}

export interface RosterEntry {
  readonly division: string;
  readonly week: number;
  readonly team: string;
  readonly playerName: string;
  readonly position: string;
  readonly lineupSlot: string;
  readonly proTeam: string;
  readonly points: number;
  readonly projectedPoints: number;
  readonly injuryStatus: string | null;
  readonly onBye: boolean;
}

export interface DivisionData {
  readonly leagueId: number;
  readonly name: string;
  readonly settings: LeagueSettings;
  readonly week: number; // the week the weekly lines describe
  readonly teams: readonly TeamStats[];
  readonly games: readonly GameResult[];
  readonly matchups: readonly Matchup[];
  readonly weeklyGames: readonly WeeklyGameResult[];
  readonly weeklyPlayers: readonly WeeklyPlayerStats[];
  readonly rosters: readonly RosterEntry[];
}

export type SeasonChallengeName =
  | 'Most Points Overall'
  | 'Most Points in One Game'
  | 'Most Points in a Loss'
  | 'Least Points in a Win'
  | 'Closest Victory';

export interface ChallengeResult {
  readonly challengeName: SeasonChallengeName;
  readonly winner: string;
  readonly owner: string;
  readonly division: string;
  readonly value: number;
  readonly context: ChallengeContext;
}

export interface WeeklyChallenge {
  readonly challengeName: string;
  readonly challengeType: ChallengeType;
  readonly week: number;
  readonly winner: string;
  readonly division: string;
  readonly value: number;
  readonly context: ChallengeContext;
}

export interface PhaseState {
  readonly division: string;
  readonly phase: PlayoffPhase;
  readonly week: number; // effective week after the completeness fallback
  readonly nominalWeek: number;
  readonly regularSeasonLength: number;
}

export interface LeaguePhase {
  readonly phase: PlayoffPhase;
  readonly week: number;
  readonly divisions: readonly PhaseState[];
}

export interface PlayoffMatchup {
  readonly matchupId: string;
  readonly roundName: string;
  readonly division: string;
  readonly seed1: number;
  readonly team1: string;
  readonly owner1: string;
  readonly score1: number | null;
  readonly seed2: number;
  readonly team2: string;
  readonly owner2: string;
  readonly score2: number | null;
  readonly winner: string | null;
  readonly winnerSeed: number | null;
}

export interface PlayoffBracket {
  readonly round: BracketRound;
  readonly week: number;
  readonly division: string;
  readonly matchups: readonly PlayoffMatchup[];
}

export interface SeededTeam {
  readonly seed: number;
  readonly team: TeamStats;
}

export interface RosterSlot {
  readonly slot: string;
  readonly playerName: string | null;
  readonly proTeam: string | null;
  readonly projectedPoints: number;
  readonly points: number;
  readonly gameStatus: GameStatus;
  readonly injuryStatus: string | null;
  readonly onBye: boolean;
  readonly isStarter: boolean;
}

export interface ChampionshipRoster {
  readonly team: string;
  readonly owner: string;
  readonly division: string;
  readonly seed: number;
  readonly week: number;
  readonly starters: readonly RosterSlot[];
  readonly bench: readonly RosterSlot[];
  readonly totalScore: number;
  readonly projectedScore: number;
  readonly emptySlots: readonly string[];
  readonly warnings: readonly string[];
}

export interface ChampionshipProgress {
  readonly status: ProgressStatus;
  readonly gamesCompleted: number;
  readonly totalGames: number;
  readonly completionPct: number;
}

export interface ChampionshipEntry {
  readonly rank: number;
  readonly team: string;
  readonly owner: string;
  readonly division: string;
  readonly score: number;
  readonly projectedScore: number;
  readonly isChampion: boolean;
}

export interface ChampionshipLeaderboard {
  readonly week: number;
  readonly entries: readonly ChampionshipEntry[];
  readonly rosters: readonly ChampionshipRoster[];
  readonly progress: ChampionshipProgress;
}

/** Week boundaries of every season phase, derived from league settings. */
export interface SeasonStructure {
  readonly regularSeasonStart: number;
  readonly regularSeasonEnd: number;
  readonly playoffStart: number;
  readonly playoffEnd: number;
  readonly championshipWeek: number;
  readonly playoffRounds: number;
}

/** Best regular-season team of a division. */
export interface DivisionChampion {
  readonly division: string;
  readonly team: string;
  readonly owner: string;
  readonly wins: number;
  readonly losses: number;
  readonly ties: number;
  readonly pointsFor: number;
  readonly pointsAgainst: number;
  readonly winPercentage: number;
}

export interface PlayoffRoundSummary {
  readonly round: BracketRound;
  readonly week: number;
  readonly brackets: readonly PlayoffBracket[];
}

export interface SeasonSummary {
  readonly year: number;
  readonly generatedAt: string; // ISO 8601
  readonly status: SeasonStatus;
  readonly phase: PlayoffPhase;
  readonly structure: SeasonStructure;
  readonly divisionChampions: readonly DivisionChampion[];
  readonly seasonChallenges: readonly ChallengeResult[];
  readonly playoffs: readonly PlayoffRoundSummary[];
  readonly championship: ChampionshipLeaderboard | null;
}

export interface LeagueReport {
  readonly phase: LeaguePhase;
  readonly seasonChallenges: readonly ChallengeResult[];
  readonly weeklyChallenges: readonly WeeklyChallenge[];
  readonly brackets: readonly PlayoffBracket[];
  readonly championship: ChampionshipLeaderboard | null;
  readonly seasonSummary: SeasonSummary | null;
}
