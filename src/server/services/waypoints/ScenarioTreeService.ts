/**
 * File discovery, reading and writing around the
 * per-map builder.
 *
 * Layout:
 *   <maps>/<name>.map
 *   <src>/<name>/*.scen
 *   <dst>/<name>_<n>wp/*.scen   (multi-count)
 *   <dst>/<name>/*.scen         (legacy single count)
 *
 * Failures inside one map are reported and the run moves on; only missing
 * input directories or an empty map set fail the run.
 */

import fs from 'fs';
import path from 'path';
import fg from 'fast-glob';
import { Result, ok, err } from 'neverthrow';
import { GridIndex } from '../../../shared/types/GridTypes';
import { ParsedScenario } from '../../../shared/types/ScenarioTypes';
import { describeError, NoFreeCellError, ScenarioIoError, WaypointError } from './errors';
import { GenerationReport } from './GenerationReport';
import { HierarchicalScenarioBuilder } from './HierarchicalScenarioBuilder';
import { parseMap } from './mapParser';
import { parseScenario } from './scenarioFormat';
import { WaypointLogger } from './WaypointLogger';

export interface TreeRunOptions {
  mapsDir: string;
  srcDir: string;
  dstDir: string;
  waypointCounts: readonly number[];
  /** Single-count mode: one output directory per map, named after the map. */
  legacy: boolean;
  seed: number;
  correctGoals: boolean;
  passableChars: string;
}

const logger = new WaypointLogger('ScenarioTree');

export function outputDirFor(dstDir: string, mapName: string, count: number, legacy: boolean): string {
  return legacy ? path.join(dstDir, mapName) : path.join(dstDir, `${mapName}_${count}wp`);
}

/** Relative path from the scenario root with `/` separators. */
export function scenarioKeyFor(srcDir: string, filePath: string): string {
  return path.relative(srcDir, filePath).split(path.sep).join('/');
}

function isDirectory(dir: string): boolean {
  try {
    return fs.statSync(dir).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Parse every `*.map` directly inside `mapsDir`, keyed by file stem.
 * Unusable maps are reported and left out.
 */
export function loadMaps(mapsDir: string, passableChars: string, report: GenerationReport): Map<string, GridIndex> {
  const maps = new Map<string, GridIndex>();
  const files = fg.sync('*.map', { cwd: mapsDir, onlyFiles: true }).sort();

  for (const file of files) {
    const filePath = path.join(mapsDir, file);
    const mapName = path.basename(file, '.map');

    let text: string;
    try {
      text = fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
      report.recordMapSkipped(filePath, 'SCENARIO_IO', describeError(error));
      logger.warn(`Could not read map ${file}`, { error: describeError(error) });
      continue;
    }

    const parsed = parseMap(text, passableChars).andThen((index): Result<GridIndex, WaypointError> =>
      index.freeCells.length > 0 ? ok(index) : err(new NoFreeCellError(`Map ${mapName} has no free cells`))
    );
    if (parsed.isErr()) {
      report.recordMapSkipped(filePath, parsed.error.code, parsed.error.message);
      logger.warn(`Skipping map ${file}: ${parsed.error.message}`);
      continue;
    }

    maps.set(mapName, parsed.value);
    report.recordMapLoaded();
    logger.info(`Loaded map ${file}`, {
      height: parsed.value.grid.height,
      width: parsed.value.grid.width,
      freeCells: parsed.value.freeCells.length,
    });
  }

  return maps;
}

function readScenarios(srcDir: string, scenarioDir: string, report: GenerationReport): ParsedScenario[] {
  const files = fg.sync('*.scen', { cwd: scenarioDir, onlyFiles: true }).sort();
  const scenarios: ParsedScenario[] = [];

  for (const file of files) {
    const filePath = path.join(scenarioDir, file);
    try {
      const text = fs.readFileSync(filePath, 'utf-8');
      scenarios.push(parseScenario(text, scenarioKeyFor(srcDir, filePath)));
    } catch (error) {
      const ioError = new ScenarioIoError(describeError(error), filePath);
      report.recordScenarioSkipped(filePath, ioError.code, ioError.message);
      logger.warn(`Could not read ${filePath}`, { error: ioError.message });
    }
  }

  return scenarios;
}

function writeOutput(filePath: string, text: string, report: GenerationReport): void {
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, text, 'utf-8');
    report.recordFileWritten(filePath);
  } catch (error) {
    report.recordWriteFailed(filePath, describeError(error));
    logger.warn(`Could not write ${filePath}`, { error: describeError(error) });
  }
}

function processMap(
  mapName: string,
  index: GridIndex,
  scenarioDir: string,
  options: TreeRunOptions,
  report: GenerationReport
): void {
  const scenarios = readScenarios(options.srcDir, scenarioDir, report);
  const builder = new HierarchicalScenarioBuilder(
    mapName,
    index,
    {
      globalSeed: options.seed,
      waypointCounts: options.waypointCounts,
      correctGoals: options.correctGoals,
    },
    report
  );

  for (const built of builder.build(scenarios)) {
    const fileName = path.posix.basename(built.scenarioKey);
    for (const [count, text] of built.outputs) {
      const outDir = outputDirFor(options.dstDir, mapName, count, options.legacy);
      writeOutput(path.join(outDir, fileName), text, report);
    }
  }
}

/**
 * Generate augmented scenarios for every map that has a scenario folder.
 * Returns an error only for run-level failures.
 */
export function generateScenarioTree(
  options: TreeRunOptions,
  report: GenerationReport
): Result<GenerationReport, ScenarioIoError> {
  if (!isDirectory(options.mapsDir)) {
    return err(new ScenarioIoError(`Maps directory ${options.mapsDir} does not exist`, options.mapsDir));
  }
  if (!isDirectory(options.srcDir)) {
    return err(new ScenarioIoError(`Source directory ${options.srcDir} does not exist`, options.srcDir));
  }

  const maps = loadMaps(options.mapsDir, options.passableChars, report);
  if (maps.size === 0) {
    return err(new ScenarioIoError(`No valid map files found in ${options.mapsDir}`, options.mapsDir));
  }

  try {
    fs.mkdirSync(options.dstDir, { recursive: true });
  } catch (error) {
    return err(new ScenarioIoError(`Cannot create ${options.dstDir}: ${describeError(error)}`, options.dstDir));
  }

  const subdirs = fg.sync('*', { cwd: options.srcDir, onlyDirectories: true, deep: 1 }).sort();
  for (const mapName of subdirs) {
    const scenarioDir = path.join(options.srcDir, mapName);
    const index = maps.get(mapName);
    if (!index) {
      report.recordScenarioSkipped(scenarioDir, 'MAP_NOT_FOUND', `No map file found for ${mapName}`);
      logger.warn(`No map file found for ${mapName}, skipping`);
      continue;
    }

    try {
      processMap(mapName, index, scenarioDir, options, report);
    } catch (error) {
      report.recordMapSkipped(scenarioDir, error instanceof WaypointError ? error.code : 'UNEXPECTED', describeError(error));
      logger.error(`Map ${mapName} failed`, { error: describeError(error) });
    }
  }

  return ok(report);
}
