/**
 * verify-waypoints: checks that two generated files of the same scenario
 * are hierarchically consistent, and optionally that every waypoint of the
 * larger file is valid on its map.
 */

import fs from 'fs';
import {
  checkWaypointFile,
  compareWaypointFiles,
  describeError,
  parseMap,
  WaypointLogger,
} from '../services/waypoints';
import { loadWaypointConfig } from '../config/waypointConfig';
import { scanArgs } from './argv';
import { EXIT_FAILURE, EXIT_OK, EXIT_USAGE } from './generateWaypointsCli';

export const VERIFY_USAGE = [
  'Usage: verify-waypoints <smaller.scen> <larger.scen> [--map <file.map>]',
  'Example: verify-waypoints maze_2wp/maze-1.scen maze_4wp/maze-1.scen',
].join('\n');

const logger = new WaypointLogger('VerifyWaypoints');

function readText(filePath: string): string | null {
  try {
    return fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    logger.error(`Could not read ${filePath}`, { error: describeError(error) });
    return null;
  }
}

export function runVerifyWaypoints(argv: readonly string[]): number {
  const { options, flags, positionals } = scanArgs(argv, ['help']);
  if (flags.has('help')) {
    console.log(VERIFY_USAGE);
    return EXIT_OK;
  }

  const unknown = Object.keys(options).filter((key) => key !== 'map');
  if (positionals.length !== 2 || unknown.length > 0 || options.map === '') {
    console.error(VERIFY_USAGE);
    return EXIT_USAGE;
  }

  const [smallerPath, largerPath] = positionals;
  logger.info(`Comparing ${smallerPath} and ${largerPath}`);

  const smaller = readText(smallerPath);
  const larger = readText(largerPath);
  if (smaller === null || larger === null) {
    return EXIT_FAILURE;
  }

  const comparison = compareWaypointFiles(smaller, larger);
  for (const issue of comparison.issues) {
    logger.warn(issue.message, { kind: issue.kind, line: issue.lineNumber });
  }
  logger.info('Comparison result', {
    agents: comparison.agents,
    matches: comparison.matches,
    mismatches: comparison.mismatches,
    passthroughLines: comparison.passthroughLines,
  });

  let valid = comparison.issues.length === 0;

  if (options.map !== undefined) {
    const mapText = readText(options.map);
    if (mapText === null) {
      return EXIT_FAILURE;
    }
    let passableChars: string;
    try {
      passableChars = loadWaypointConfig().passableChars;
    } catch (error) {
      console.error(describeError(error));
      return EXIT_USAGE;
    }

    const index = parseMap(mapText, passableChars);
    if (index.isErr()) {
      logger.error(`Invalid map ${options.map}: ${index.error.message}`);
      return EXIT_FAILURE;
    }

    const check = checkWaypointFile(index.value, larger);
    for (const issue of check.issues) {
      logger.warn(issue.message, { kind: issue.kind, line: issue.lineNumber });
    }
    for (const overlap of check.overlaps) {
      logger.info(`Cell (${overlap.cell.x},${overlap.cell.y}) shared by lines ${overlap.lineNumbers.join(', ')}`);
    }
    valid = valid && check.issues.length === 0;
  }

  if (valid) {
    logger.info('All waypoint sequences are hierarchically consistent');
  }
  return valid ? EXIT_OK : EXIT_FAILURE;
}
