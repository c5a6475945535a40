/**
 * Waypoint Generation Configuration
 * Environment-driven settings and fixed constants for the generator
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../services/waypoints/errors';
import { WaypointLogLevelName } from '../services/waypoints/WaypointLogger';

dotenv.config();

/**
 * Waypoint counts produced in multi-count mode, one output directory each
 */
export const MULTI_COUNT_WAYPOINTS: readonly number[] = [0, 1, 2, 4, 8];

/** `type`, `height`, `width`, `map` */
export const MAP_HEADER_LINES = 4;

/** bucket, map, width, height, start x/y, goal x/y, optimal length */
export const SCENARIO_FIELD_COUNT = 9;

export interface WaypointConfig {
  seed: number;
  logLevel: WaypointLogLevelName;
  correctGoals: boolean;
  passableChars: string;
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  WAYPOINT_SEED: z.coerce.number().int().default(0),
  WAYPOINT_LOG_LEVEL: z.enum(['TRACE', 'DEBUG', 'INFO', 'WARN', 'ERROR']).default('INFO'),
  WAYPOINT_CORRECT_GOALS: booleanFlag.default('false'),
  WAYPOINT_PASSABLE_CHARS: z.string().min(1).default('.'),
});

/**
 * Build the generator configuration from environment variables.
 * Throws ConfigurationError listing every invalid variable.
 */
export function loadWaypointConfig(env: NodeJS.ProcessEnv = process.env): WaypointConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid waypoint configuration: ${issues.join('; ')}`, issues);
  }

  return {
    seed: parsed.data.WAYPOINT_SEED,
    logLevel: parsed.data.WAYPOINT_LOG_LEVEL,
    correctGoals: parsed.data.WAYPOINT_CORRECT_GOALS,
    passableChars: parsed.data.WAYPOINT_PASSABLE_CHARS,
  };
}
