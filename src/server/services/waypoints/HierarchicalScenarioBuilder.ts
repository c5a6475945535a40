/**
 * Two-pass waypoint generation for one map.
 *
 * Pass 1 parses nothing new: it corrects each agent's start (and goal, when
 * enabled) and looks up the reachable cells. Components are labelled once
 * per map; agents in one component share a single reachable list. Pass 2 walks agents in file
 * order then line order, draws each agent's maximal sequence once, and emits
 * every requested count as a prefix of it.
 *
 * Agent lifecycle:
 *   Parsed → PositionFixed → Reached → Assigned → Emitted × |counts|
 * A failed position fix skips straight to Emitted with empty sequences.
 */

import { Cell, GridIndex } from '../../../shared/types/GridTypes';
import { ParsedScenario, ScenarioAgent, WaypointRecord } from '../../../shared/types/ScenarioTypes';
import { UnreachableStartError } from './errors';
import { GenerationReport, AgentRef } from './GenerationReport';
import { fixPosition } from './PositionCorrector';
import { ReachabilityIndex } from './reachability';
import { formatAugmentedLine, joinScenarioLines } from './scenarioFormat';
import { UniquenessRegistry } from './UniquenessRegistry';
import { WaypointAssigner } from './WaypointAssigner';
import { WaypointLogger } from './WaypointLogger';

export interface MapRunOptions {
  globalSeed: number;
  waypointCounts: readonly number[];
  correctGoals: boolean;
}

interface CollectedAgent {
  ref: AgentRef;
  agent: ScenarioAgent;
  reachable: ReadonlyArray<Cell>;
  positionFixed: boolean;
}

export interface BuiltScenario {
  scenarioKey: string;
  records: WaypointRecord[];
  /** Output file text per waypoint count. */
  outputs: Map<number, string>;
}

/** Sorted, de-duplicated, non-negative integer counts. */
export function normalizeWaypointCounts(counts: readonly number[]): number[] {
  for (const count of counts) {
    if (!Number.isInteger(count) || count < 0) {
      throw new RangeError(`Waypoint count must be a non-negative integer, got ${count}`);
    }
  }
  return [...new Set(counts)].sort((a, b) => a - b);
}

export class HierarchicalScenarioBuilder {
  private readonly counts: number[];
  private readonly maxCount: number;
  private readonly logger: WaypointLogger;
  private readonly reachability: ReachabilityIndex;

  constructor(
    private mapName: string,
    private index: GridIndex,
    private options: MapRunOptions,
    private report: GenerationReport
  ) {
    this.counts = normalizeWaypointCounts(options.waypointCounts);
    this.maxCount = this.counts.length > 0 ? this.counts[this.counts.length - 1] : 0;
    this.logger = new WaypointLogger('ScenarioBuilder').withMap(mapName);
    this.reachability = new ReachabilityIndex(index);
  }

  /**
   * Generate outputs for every scenario of this map. Scenarios are processed
   * in the order given and share one uniqueness registry.
   */
  build(scenarios: ReadonlyArray<ParsedScenario>): BuiltScenario[] {
    const collected = scenarios.map((scenario) => this.collect(scenario));

    const registry = new UniquenessRegistry();
    const assigner = new WaypointAssigner(registry);

    const built = scenarios.map((scenario, i) => this.assignAndEmit(scenario, collected[i], assigner));

    this.logger.info('Map complete', {
      scenarios: scenarios.length,
      components: this.reachability.componentCount,
      committedWaypoints: registry.size,
    });
    return built;
  }

  // ── Pass 1 ─────────────────────────────────────────────────────────────
  private collect(scenario: ParsedScenario): Map<number, CollectedAgent> {
    const logger = this.logger.withScenario(scenario.scenarioKey);
    const agents = new Map<number, CollectedAgent>();

    for (const line of scenario.lines) {
      if (line.kind === 'passthrough') {
        logger.debug(`Line ${line.lineNumber} passed through unchanged`, { reason: line.reason });
        continue;
      }
      if (line.kind !== 'agent') continue;

      const ref: AgentRef = {
        mapName: this.mapName,
        scenarioKey: scenario.scenarioKey,
        lineNumber: line.lineNumber,
      };
      agents.set(line.lineNumber, this.collectAgent(ref, line.agent, logger));
    }

    return agents;
  }

  private collectAgent(ref: AgentRef, parsed: ScenarioAgent, logger: WaypointLogger): CollectedAgent {
    const { grid } = this.index;
    const agent: ScenarioAgent = { ...parsed };

    const start = fixPosition(grid, parsed.start);
    if (start.isErr()) {
      this.report.recordUnreachable(ref);
      logger.warn(`Agent ${ref.lineNumber}: ${start.error.message}`);
      return { ref, agent, reachable: [], positionFixed: false };
    }

    const { cell: fixedStart, correction } = start.value;
    if (correction) {
      agent.start = fixedStart;
      this.report.recordCorrection(ref, 'start', correction);
      logger.warn(`Fixed agent ${ref.lineNumber} start (${correction.reason})`, {
        from: correction.original,
        to: correction.corrected,
      });
    }

    if (this.options.correctGoals) {
      const goal = fixPosition(grid, parsed.goal);
      if (goal.isOk() && goal.value.correction) {
        agent.goal = goal.value.cell;
        this.report.recordCorrection(ref, 'goal', goal.value.correction);
        logger.warn(`Fixed agent ${ref.lineNumber} goal (${goal.value.correction.reason})`, {
          from: goal.value.correction.original,
          to: goal.value.correction.corrected,
        });
      }
    }

    const reachable = this.reachability.reachableFrom(fixedStart);
    if (reachable.length === 0) {
      const error = new UnreachableStartError(`Agent ${ref.lineNumber} start has no reachable cells`);
      this.report.recordUnreachable(ref);
      logger.warn(error.message, { start: fixedStart });
    } else if (reachable.length < this.maxCount) {
      this.report.recordDegraded(ref, reachable.length, this.maxCount);
      logger.warn(`Agent ${ref.lineNumber} has only ${reachable.length} reachable cells, need ${this.maxCount}`);
    }

    return { ref, agent, reachable, positionFixed: true };
  }

  // ── Pass 2 ─────────────────────────────────────────────────────────────
  private assignAndEmit(
    scenario: ParsedScenario,
    agents: Map<number, CollectedAgent>,
    assigner: WaypointAssigner
  ): BuiltScenario {
    const logger = this.logger.withScenario(scenario.scenarioKey);
    const maximal = new Map<number, Cell[]>();

    for (const [lineNumber, collected] of agents) {
      maximal.set(lineNumber, this.assignAgent(collected, assigner, logger));
    }

    const records: WaypointRecord[] = [];
    const outputs = new Map<number, string>();

    for (const count of this.counts) {
      const lines = scenario.lines.map((line) => {
        const collected = agents.get(line.lineNumber);
        if (line.kind !== 'agent' || !collected) {
          return line.raw;
        }
        // Truncate, never resample: smaller counts are prefixes of larger ones
        const waypoints = (maximal.get(line.lineNumber) ?? []).slice(0, count);
        records.push({ agent: collected.agent, waypointCount: count, waypoints });
        return formatAugmentedLine(collected.agent, waypoints);
      });
      outputs.set(count, joinScenarioLines(lines));
    }

    this.report.recordScenarioProcessed(agents.size);
    logger.info(`Processed ${agents.size} agents`);

    return { scenarioKey: scenario.scenarioKey, records, outputs };
  }

  private assignAgent(collected: CollectedAgent, assigner: WaypointAssigner, logger: WaypointLogger): Cell[] {
    if (this.maxCount === 0 || !collected.positionFixed || collected.reachable.length === 0) {
      return [];
    }

    const assignment = assigner.assign({
      agentId: collected.ref.lineNumber,
      scenarioKey: collected.ref.scenarioKey,
      globalSeed: this.options.globalSeed,
      reachable: collected.reachable,
      maxCount: this.maxCount,
    });

    if (assignment.fallbackCells.length > 0) {
      this.report.recordFallback(collected.ref, assignment.fallbackCells);
      logger.warn(
        `Agent ${collected.ref.lineNumber} reuses ${assignment.fallbackCells.length} waypoint(s) already assigned on this map`,
        { cells: assignment.fallbackCells }
      );
    }
    logger.debug(`Agent ${collected.ref.lineNumber} waypoints`, { waypoints: assignment.waypoints });

    return assignment.waypoints;
  }
}
