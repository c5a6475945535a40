export enum WaypointLogLevel {
  TRACE = 0,
  DEBUG = 1,
  INFO = 2,
  WARN = 3,
  ERROR = 4,
}

export type WaypointLogLevelName = keyof typeof WaypointLogLevel;

export const LOG_LEVEL_BY_NAME: Record<WaypointLogLevelName, WaypointLogLevel> = {
  TRACE: WaypointLogLevel.TRACE,
  DEBUG: WaypointLogLevel.DEBUG,
  INFO: WaypointLogLevel.INFO,
  WARN: WaypointLogLevel.WARN,
  ERROR: WaypointLogLevel.ERROR,
};

type LogData = Record<string, unknown>;

/** Where a message comes from inside a run. */
export interface LogScope {
  map?: string;
  scenario?: string;
}

let globalLogLevel: WaypointLogLevel = WaypointLogLevel.INFO;

export function setGlobalWaypointLogLevel(level: WaypointLogLevel): void {
  globalLogLevel = level;
}

export function getGlobalWaypointLogLevel(): WaypointLogLevel {
  return globalLogLevel;
}

function sinkFor(level: WaypointLogLevel): (line: string) => void {
  if (level >= WaypointLogLevel.ERROR) return (line) => console.error(line);
  if (level >= WaypointLogLevel.WARN) return (line) => console.warn(line);
  return (line) => console.log(line);
}

/**
 * Leveled console logger. Lines read
 * `<level> <context> map=<map> scen=<scenario>: message {data}`,
 * with the scope fields present only when set.
 */
export class WaypointLogger {
  constructor(
    private readonly context: string,
    private readonly scope: LogScope = {}
  ) {}

  trace(message: string, data?: LogData): void {
    this.write(WaypointLogLevel.TRACE, message, data);
  }

  debug(message: string, data?: LogData): void {
    this.write(WaypointLogLevel.DEBUG, message, data);
  }

  info(message: string, data?: LogData): void {
    this.write(WaypointLogLevel.INFO, message, data);
  }

  warn(message: string, data?: LogData): void {
    this.write(WaypointLogLevel.WARN, message, data);
  }

  error(message: string, data?: LogData): void {
    this.write(WaypointLogLevel.ERROR, message, data);
  }

  /** A logger for one map; any scenario scope is dropped. */
  withMap(map: string): WaypointLogger {
    return new WaypointLogger(this.context, { map });
  }

  withScenario(scenario: string): WaypointLogger {
    return new WaypointLogger(this.context, { ...this.scope, scenario });
  }

  private write(level: WaypointLogLevel, message: string, data?: LogData): void {
    if (level < globalLogLevel) return;

    const head = [WaypointLogLevel[level].toLowerCase(), this.context, ...this.scopeFields()].join(' ');
    const tail = data ? ` ${JSON.stringify(data)}` : '';
    sinkFor(level)(`${head}: ${message}${tail}`);
  }

  private scopeFields(): string[] {
    const { map, scenario } = this.scope;
    const fields: string[] = [];
    if (map) {
      fields.push(`map=${map}`);
    }
    if (scenario) {
      // Scenario keys usually sit under a directory named after the map
      const shown = map && scenario.startsWith(`${map}/`) ? scenario.slice(map.length + 1) : scenario;
      fields.push(`scen=${shown}`);
    }
    return fields;
  }
}
