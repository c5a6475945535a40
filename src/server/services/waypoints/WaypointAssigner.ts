/**
 * WaypointAssigner: draws an agent's maximal waypoint sequence.
 *
 * Cells not yet committed to another agent are preferred. Cells from the
 * registry are only used to top up when the agent cannot otherwise reach
 * enough distinct cells, and every such use is reported.
 */

import { Cell } from '../../../shared/types/GridTypes';
import { createAgentRng, sampleWithoutReplacement } from './agentRng';
import { UniquenessRegistry } from './UniquenessRegistry';

export interface AssignmentRequest {
  agentId: number;
  scenarioKey: string;
  globalSeed: number;
  /**
   * Cells reachable from the agent's corrected start, in row-major order.
   * Usually a component list shared with other agents; never modified.
   */
  reachable: ReadonlyArray<Cell>;
  maxCount: number;
}

export interface Assignment {
  waypoints: Cell[];
  /** Cells taken from the registry; they may overlap other agents. */
  fallbackCells: Cell[];
  /** True when fewer than `maxCount` cells were reachable. */
  degraded: boolean;
}

export class WaypointAssigner {
  constructor(private registry: UniquenessRegistry) {}

  /**
   * Sample up to `maxCount` distinct reachable cells and commit the new ones
   * to the registry.
   */
  assign(request: AssignmentRequest): Assignment {
    const { agentId, scenarioKey, globalSeed, maxCount } = request;
    if (maxCount <= 0 || request.reachable.length === 0) {
      return { waypoints: [], fallbackCells: [], degraded: maxCount > 0 };
    }

    const available: Cell[] = [];
    const fallback: Cell[] = [];
    for (const cell of request.reachable) {
      if (this.registry.has(cell)) {
        fallback.push(cell);
      } else {
        available.push(cell);
      }
    }

    const random = createAgentRng(globalSeed, agentId, scenarioKey);

    let waypoints: Cell[];
    let fallbackCells: Cell[] = [];
    if (available.length >= maxCount) {
      waypoints = sampleWithoutReplacement(available, maxCount, random);
    } else {
      const fromAvailable = sampleWithoutReplacement(available, available.length, random);
      fallbackCells = sampleWithoutReplacement(fallback, maxCount - available.length, random);
      waypoints = [...fromAvailable, ...fallbackCells];
    }

    for (const cell of waypoints) {
      this.registry.commit(cell);
    }

    return {
      waypoints,
      fallbackCells,
      degraded: request.reachable.length < maxCount,
    };
  }
}
