/**
 * Waypoint generation errors.
 *
 * Map-level errors (MalformedMapError, NoFreeCellError) cause every scenario
 * of that map to be skipped. Agent- and line-level errors are absorbed by the
 * caller and only reported.
 */

export class WaypointError extends Error {
  constructor(
    message: string,
    public code: string
  ) {
    super(message);
    this.name = 'WaypointError';
  }
}

export class MalformedMapError extends WaypointError {
  constructor(message: string) {
    super(message, 'MALFORMED_MAP');
    this.name = 'MalformedMapError';
  }
}

export class NoFreeCellError extends WaypointError {
  constructor(message: string = 'Grid has no free cells') {
    super(message, 'NO_FREE_CELL');
    this.name = 'NoFreeCellError';
  }
}

export class UnreachableStartError extends WaypointError {
  constructor(message: string) {
    super(message, 'UNREACHABLE_START');
    this.name = 'UnreachableStartError';
  }
}

export class MalformedScenarioLineError extends WaypointError {
  constructor(
    message: string,
    public lineNumber: number
  ) {
    super(message, 'MALFORMED_SCENARIO_LINE');
    this.name = 'MalformedScenarioLineError';
  }
}

export class ScenarioIoError extends WaypointError {
  constructor(
    message: string,
    public filePath: string
  ) {
    super(message, 'SCENARIO_IO');
    this.name = 'ScenarioIoError';
  }
}

export class ConfigurationError extends WaypointError {
  constructor(
    message: string,
    public issues: string[] = []
  ) {
    super(message, 'INVALID_CONFIGURATION');
    this.name = 'ConfigurationError';
  }
}

/** Message text of any thrown value. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
