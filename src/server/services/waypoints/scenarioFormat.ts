/**
 * Scenario file text format.
 *
 * Original agent line (9 fields):
 *   bucket map width height start_x start_y goal_x goal_y optimal_length
 * Augmented line: the 9 fields, the waypoint count, then x y per waypoint.
 */

import { Result, ok, err } from 'neverthrow';
import { Cell } from '../../../shared/types/GridTypes';
import {
  AugmentedAgentLine,
  ParsedScenario,
  ScenarioAgent,
  ScenarioLine,
} from '../../../shared/types/ScenarioTypes';
import { SCENARIO_FIELD_COUNT } from '../../config/waypointConfig';
import { MalformedScenarioLineError } from './errors';

const INTEGER_PATTERN = /^-?\d+$/;

export function splitFields(line: string): string[] {
  return line.includes('\t') ? line.split('\t') : line.trim().split(/\s+/);
}

export function isVersionHeader(line: string): boolean {
  return /^version\b/i.test(line.trim());
}

/** Split file text into lines, dropping the empty piece after a final newline. */
export function splitScenarioLines(text: string): string[] {
  if (text === '') return [];
  const lines = text.split('\n').map((line) => line.replace(/\r$/, ''));
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

export function parseAgentLine(line: string, lineNumber: number): Result<ScenarioAgent, MalformedScenarioLineError> {
  const fields = splitFields(line);
  if (fields.length !== SCENARIO_FIELD_COUNT) {
    return err(
      new MalformedScenarioLineError(
        `Expected ${SCENARIO_FIELD_COUNT} fields, found ${fields.length}`,
        lineNumber
      )
    );
  }

  const [bucket, mapName, ...rest] = fields;
  const integerFields = rest.slice(0, 6);
  const optimalLength = rest[6];

  const badInteger = integerFields.find((field) => !INTEGER_PATTERN.test(field));
  if (badInteger !== undefined) {
    return err(new MalformedScenarioLineError(`Non-integer field "${badInteger}"`, lineNumber));
  }
  if (optimalLength.trim() === '' || !Number.isFinite(Number(optimalLength))) {
    return err(new MalformedScenarioLineError(`Invalid optimal length "${optimalLength}"`, lineNumber));
  }

  const [width, height, startX, startY, goalX, goalY] = integerFields.map(Number);
  return ok({
    lineNumber,
    bucket,
    mapName,
    width,
    height,
    start: { x: startX, y: startY },
    goal: { x: goalX, y: goalY },
    optimalLength,
  });
}

/**
 * Classify every line of a scenario file. Line numbers are 1-based and count
 * the header line.
 */
export function parseScenario(text: string, scenarioKey: string): ParsedScenario {
  const lines: ScenarioLine[] = splitScenarioLines(text).map((raw, index): ScenarioLine => {
    const lineNumber = index + 1;
    if (index === 0 && isVersionHeader(raw)) {
      return { kind: 'header', lineNumber, raw };
    }
    if (raw.trim() === '') {
      return { kind: 'blank', lineNumber, raw };
    }
    return parseAgentLine(raw, lineNumber).match<ScenarioLine>(
      (agent) => ({ kind: 'agent', lineNumber, raw, agent }),
      (error) => ({ kind: 'passthrough', lineNumber, raw, reason: error.message })
    );
  });

  return { scenarioKey, lines };
}

export function agentFields(agent: ScenarioAgent): string[] {
  return [
    agent.bucket,
    agent.mapName,
    String(agent.width),
    String(agent.height),
    String(agent.start.x),
    String(agent.start.y),
    String(agent.goal.x),
    String(agent.goal.y),
    agent.optimalLength,
  ];
}

export function formatAugmentedLine(agent: ScenarioAgent, waypoints: ReadonlyArray<Cell>): string {
  const tail = [String(waypoints.length)];
  for (const cell of waypoints) {
    tail.push(String(cell.x), String(cell.y));
  }
  return [...agentFields(agent), ...tail].join('\t');
}

/** Serialize output lines; every line, the last included, ends with a newline. */
export function joinScenarioLines(lines: ReadonlyArray<string>): string {
  return lines.map((line) => `${line}\n`).join('');
}

/**
 * Read an augmented agent line back. Returns an error for lines that are not
 * augmented agent lines (headers, blanks, short lines).
 */
export function parseAugmentedLine(
  line: string,
  lineNumber: number
): Result<AugmentedAgentLine, MalformedScenarioLineError> {
  const fields = splitFields(line);
  if (fields.length < SCENARIO_FIELD_COUNT + 1) {
    return err(new MalformedScenarioLineError('Line has no waypoint count', lineNumber));
  }

  const countField = fields[SCENARIO_FIELD_COUNT];
  if (!INTEGER_PATTERN.test(countField) || Number(countField) < 0) {
    return err(new MalformedScenarioLineError(`Invalid waypoint count "${countField}"`, lineNumber));
  }

  const count = Number(countField);
  const coordinates = fields.slice(SCENARIO_FIELD_COUNT + 1);
  if (coordinates.length !== count * 2) {
    return err(
      new MalformedScenarioLineError(
        `Waypoint count ${count} needs ${count * 2} coordinates, found ${coordinates.length}`,
        lineNumber
      )
    );
  }

  const waypoints: Cell[] = [];
  for (let i = 0; i < coordinates.length; i += 2) {
    const [x, y] = [coordinates[i], coordinates[i + 1]];
    if (!INTEGER_PATTERN.test(x) || !INTEGER_PATTERN.test(y)) {
      return err(new MalformedScenarioLineError(`Non-integer waypoint "${x} ${y}"`, lineNumber));
    }
    waypoints.push({ x: Number(x), y: Number(y) });
  }

  return ok({
    lineNumber,
    originalFields: fields.slice(0, SCENARIO_FIELD_COUNT),
    waypoints,
  });
}
