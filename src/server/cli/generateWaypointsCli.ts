/**
 * generate-waypoints: augments every scenario tree under --src with
 * waypoints and writes the results under --dst.
 */

import fs from 'fs';
import { z } from 'zod';
import { loadWaypointConfig, MULTI_COUNT_WAYPOINTS, WaypointConfig } from '../config/waypointConfig';
import {
  describeError,
  GenerationReport,
  generateScenarioTree,
  LOG_LEVEL_BY_NAME,
  setGlobalWaypointLogLevel,
  WaypointLogger,
} from '../services/waypoints';
import { scanArgs } from './argv';

export const GENERATE_USAGE = [
  'Usage: generate-waypoints --maps <dir> --src <dir> --dst <dir> [options]',
  '',
  'Options:',
  '  --maps <dir>         Directory containing .map files',
  '  --src <dir>          Root of the original scenario folders (one per map)',
  '  --dst <dir>          Root for the generated scenario folders',
  '  --n <count>          Legacy mode: generate a single waypoint count',
  '  --seed <int>         Random seed (default WAYPOINT_SEED or 0)',
  '  --report <file>      Write the full JSON run report to a file',
  '  --correct-goals      Also move invalid goal positions onto free cells',
  '  --log-level <level>  TRACE, DEBUG, INFO, WARN or ERROR',
  '  --help               Show this help',
].join('\n');

const KNOWN_OPTIONS = ['maps', 'src', 'dst', 'n', 'seed', 'report', 'log-level'];
const BOOLEAN_FLAGS = ['help', 'correct-goals'];

const optionsSchema = z.object({
  maps: z.string().min(1, 'is required'),
  src: z.string().min(1, 'is required'),
  dst: z.string().min(1, 'is required'),
  n: z.string().regex(/^\d+$/, 'must be a non-negative integer').transform(Number).optional(),
  seed: z.string().regex(/^-?\d+$/, 'must be an integer').transform(Number).optional(),
  report: z.string().min(1).optional(),
  'log-level': z.enum(['TRACE', 'DEBUG', 'INFO', 'WARN', 'ERROR']).optional(),
});

export type GenerateOptions = z.infer<typeof optionsSchema>;

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const logger = new WaypointLogger('GenerateWaypoints');

/**
 * Run the generator. Returns the process exit code: 0 when at least one
 * output file was written, 1 when none was, 2 for invalid arguments.
 */
export function runGenerateWaypoints(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): number {
  const scanned = scanArgs(argv, BOOLEAN_FLAGS);
  if (scanned.flags.has('help')) {
    console.log(GENERATE_USAGE);
    return EXIT_OK;
  }

  const unknown = [
    ...Object.keys(scanned.options).filter((key) => !KNOWN_OPTIONS.includes(key)),
    ...scanned.positionals,
  ];
  if (unknown.length > 0) {
    console.error(`Unknown arguments: ${unknown.join(' ')}\n\n${GENERATE_USAGE}`);
    return EXIT_USAGE;
  }

  const parsed = optionsSchema.safeParse(scanned.options);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `--${issue.path.join('.')} ${issue.message}`);
    console.error(`${problems.join('\n')}\n\n${GENERATE_USAGE}`);
    return EXIT_USAGE;
  }

  let config: WaypointConfig;
  try {
    config = loadWaypointConfig(env);
  } catch (error) {
    console.error(describeError(error));
    return EXIT_USAGE;
  }

  const options = parsed.data;
  setGlobalWaypointLogLevel(LOG_LEVEL_BY_NAME[options['log-level'] ?? config.logLevel]);

  const legacy = options.n !== undefined;
  const waypointCounts = options.n !== undefined ? [options.n] : [...MULTI_COUNT_WAYPOINTS];
  const seed = options.seed ?? config.seed;
  const report = new GenerationReport(seed, waypointCounts);

  logger.info(
    legacy
      ? `Running in legacy mode with ${options.n} waypoints`
      : `Running in multi-file mode with waypoint counts: ${waypointCounts.join(', ')}`,
    { runId: report.runId, seed }
  );

  const result = generateScenarioTree(
    {
      mapsDir: options.maps,
      srcDir: options.src,
      dstDir: options.dst,
      waypointCounts,
      legacy,
      seed,
      correctGoals: scanned.flags.has('correct-goals') || config.correctGoals,
      passableChars: config.passableChars,
    },
    report
  );

  if (result.isErr()) {
    logger.error(result.error.message);
  }

  const summary = report.summary();
  logger.info('Run summary', { ...summary });
  for (const skipped of [...report.getSkippedMaps(), ...report.getSkippedScenarios()]) {
    logger.warn(`Skipped ${skipped.path}`, { code: skipped.code, reason: skipped.reason });
  }

  if (options.report) {
    try {
      fs.writeFileSync(options.report, `${JSON.stringify(report.toJSON(), null, 2)}\n`, 'utf-8');
    } catch (error) {
      logger.error(`Could not write report ${options.report}`, { error: describeError(error) });
    }
  }

  return report.hadOutput() ? EXIT_OK : EXIT_FAILURE;
}
