/**
 * Post-hoc checks on generated scenario files.
 *
 * `compareWaypointFiles` confirms that a file generated for a smaller count
 * is a per-agent prefix of one generated for a larger count.
 * `checkWaypointFile` confirms every waypoint sits on a Free cell reachable
 * from the agent's start, and lists cells shared between agents.
 *
 * Lines the generator copies through unchanged (comments, malformed agent
 * lines) are counted, not flagged, as long as both files agree on them.
 */

import { Cell, Grid, GridIndex } from '../../../shared/types/GridTypes';
import { AugmentedAgentLine } from '../../../shared/types/ScenarioTypes';
import { cellKey, cellsEqual, isFree, parseCellKey } from '../../../shared/utils/gridUtils';
import { ReachabilityIndex } from './reachability';
import { isVersionHeader, parseAugmentedLine, splitScenarioLines } from './scenarioFormat';

export type VerificationIssueKind =
  | 'agent_count'
  | 'unparsed_line'
  | 'field_mismatch'
  | 'prefix_mismatch'
  | 'invalid_start'
  | 'invalid_waypoint'
  | 'unreachable_waypoint';

export interface VerificationIssue {
  kind: VerificationIssueKind;
  lineNumber?: number;
  message: string;
}

export interface ComparisonResult {
  agents: number;
  matches: number;
  mismatches: number;
  passthroughLines: number;
  issues: VerificationIssue[];
}

export interface WaypointOverlap {
  cell: Cell;
  lineNumbers: number[];
}

export interface FileCheckResult {
  agents: number;
  passthroughLines: number;
  issues: VerificationIssue[];
  overlaps: WaypointOverlap[];
}

interface AgentEntry {
  lineNumber: number;
  raw: string;
}

function agentEntries(text: string): AgentEntry[] {
  return splitScenarioLines(text)
    .map((raw, index) => ({ lineNumber: index + 1, raw }))
    .filter((entry) => entry.raw.trim() !== '' && !isVersionHeader(entry.raw));
}

function isPrefix(shorter: ReadonlyArray<Cell>, longer: ReadonlyArray<Cell>): boolean {
  return shorter.length <= longer.length && shorter.every((cell, i) => cellsEqual(cell, longer[i]));
}

/**
 * Compare two augmented files of the same scenario.
 *
 * @param smallerText File generated for the smaller waypoint count
 * @param largerText File generated for the larger waypoint count
 */
export function compareWaypointFiles(smallerText: string, largerText: string): ComparisonResult {
  const smaller = agentEntries(smallerText);
  const larger = agentEntries(largerText);

  if (smaller.length !== larger.length) {
    return {
      agents: 0,
      matches: 0,
      mismatches: 0,
      passthroughLines: 0,
      issues: [
        {
          kind: 'agent_count',
          message: `Different number of agents (${smaller.length} vs ${larger.length})`,
        },
      ],
    };
  }

  const issues: VerificationIssue[] = [];
  let agents = 0;
  let matches = 0;
  let mismatches = 0;
  let passthroughLines = 0;

  for (let i = 0; i < smaller.length; i++) {
    const a = parseAugmentedLine(smaller[i].raw, smaller[i].lineNumber);
    const b = parseAugmentedLine(larger[i].raw, larger[i].lineNumber);
    if (a.isErr() && b.isErr() && smaller[i].raw === larger[i].raw) {
      passthroughLines++;
      continue;
    }
    if (a.isErr()) {
      issues.push({ kind: 'unparsed_line', lineNumber: smaller[i].lineNumber, message: a.error.message });
      continue;
    }
    if (b.isErr()) {
      issues.push({ kind: 'unparsed_line', lineNumber: larger[i].lineNumber, message: b.error.message });
      continue;
    }

    agents++;
    const lineNumber = a.value.lineNumber;
    if (a.value.originalFields.join('\t') !== b.value.originalFields.join('\t')) {
      mismatches++;
      issues.push({ kind: 'field_mismatch', lineNumber, message: 'Original agent fields differ' });
      continue;
    }

    if (isPrefix(a.value.waypoints, b.value.waypoints)) {
      matches++;
    } else {
      mismatches++;
      issues.push({
        kind: 'prefix_mismatch',
        lineNumber,
        message: `Waypoints of line ${lineNumber} are not a prefix of the larger file's`,
      });
    }
  }

  return { agents, matches, mismatches, passthroughLines, issues };
}

function checkAgent(
  grid: Grid,
  reachability: ReachabilityIndex,
  agent: AugmentedAgentLine,
  issues: VerificationIssue[]
): void {
  const start = { x: Number(agent.originalFields[4]), y: Number(agent.originalFields[5]) };
  if (!isFree(grid, start)) {
    issues.push({
      kind: 'invalid_start',
      lineNumber: agent.lineNumber,
      message: `Start (${start.x},${start.y}) is not a free cell`,
    });
    return;
  }

  for (const waypoint of agent.waypoints) {
    if (!isFree(grid, waypoint)) {
      issues.push({
        kind: 'invalid_waypoint',
        lineNumber: agent.lineNumber,
        message: `Waypoint (${waypoint.x},${waypoint.y}) is not a free cell`,
      });
    } else if (!reachability.isReachable(start, waypoint)) {
      issues.push({
        kind: 'unreachable_waypoint',
        lineNumber: agent.lineNumber,
        message: `Waypoint (${waypoint.x},${waypoint.y}) is not reachable from (${start.x},${start.y})`,
      });
    }
  }
}

/**
 * Check one augmented file against its map. Overlaps are reported, not
 * treated as issues: they are permitted when a map is too small.
 */
export function checkWaypointFile(index: GridIndex, text: string): FileCheckResult {
  const issues: VerificationIssue[] = [];
  const owners = new Map<string, number[]>();
  const reachability = new ReachabilityIndex(index);
  let agents = 0;
  let passthroughLines = 0;

  for (const entry of agentEntries(text)) {
    const parsed = parseAugmentedLine(entry.raw, entry.lineNumber);
    if (parsed.isErr()) {
      passthroughLines++;
      continue;
    }

    agents++;
    checkAgent(index.grid, reachability, parsed.value, issues);

    for (const key of new Set(parsed.value.waypoints.map(cellKey))) {
      const lines = owners.get(key) ?? [];
      lines.push(entry.lineNumber);
      owners.set(key, lines);
    }
  }

  const overlaps: WaypointOverlap[] = [];
  for (const [key, lineNumbers] of owners) {
    if (lineNumbers.length > 1) {
      overlaps.push({ cell: parseCellKey(key), lineNumbers });
    }
  }

  return { agents, passthroughLines, issues, overlaps };
}
