export class LeagueError extends Error {
  readonly division?: string;

  constructor(message: string, options: { division?: string } = {}) {
    super(message);
    this.name = new.target.name;
    this.division = options.division;
  }
}

export class ConfigurationError extends LeagueError {}

/** A record failed construction-time validation; the message names the field. */
export class DataValidationError extends LeagueError {}

/** A required collection was empty or a challenge had nothing to rank. */
export class InsufficientDataError extends LeagueError {}

/**
 * Divisions disagree on phase or week. `divisionStates` maps every division
 * to a short "week N (Phase)" description.
 */
export class DivisionSyncError extends LeagueError {
  readonly divisionStates: Readonly<Record<string, string>>;

  constructor(message: string, divisionStates: Record<string, string>, division?: string) {
    super(message, { division });
    this.divisionStates = Object.freeze({ ...divisionStates });
  }
}

/** A full season summary was requested before championship week was over. */
export class SeasonIncompleteError extends LeagueError {
  readonly currentWeek: number;
  readonly championshipWeek: number;

  constructor(message: string, currentWeek: number, championshipWeek: number) {
    super(message);
    this.currentWeek = currentWeek;
    this.championshipWeek = championshipWeek;
  }
}
