/**
 * Moves out-of-bounds or blocked agent positions onto
 * the nearest Free cell.
 *
 * Search order is deterministic: rings of increasing Manhattan distance
 * around the clamped cell; within a ring, increasing x, then increasing y.
 */

import { Result, ok, err } from 'neverthrow';
import { Cell, Grid } from '../../../shared/types/GridTypes';
import { CorrectionReason, PositionCorrection } from '../../../shared/types/ScenarioTypes';
import { clampCell, isFree, isInBounds } from '../../../shared/utils/gridUtils';
import { NoFreeCellError } from './errors';

export interface FixedPosition {
  cell: Cell;
  /** Present only when the cell had to move. */
  correction?: PositionCorrection;
}

/**
 * Free cells at exactly Manhattan distance `distance` from `center`,
 * in increasing x then increasing y.
 */
function ringCells(grid: Grid, center: Cell, distance: number): Cell[] {
  const cells: Cell[] = [];
  for (let dx = -distance; dx <= distance; dx++) {
    const dy = distance - Math.abs(dx);
    const candidates = dy === 0 ? [0] : [-dy, dy];
    for (const offset of candidates) {
      const cell = { x: center.x + dx, y: center.y + offset };
      if (isFree(grid, cell)) {
        cells.push(cell);
      }
    }
  }
  return cells;
}

function findNearestFree(grid: Grid, center: Cell): Cell | null {
  // Farthest possible cell from an in-bounds center
  const maxDistance = grid.width - 1 + grid.height - 1;
  for (let distance = 1; distance <= maxDistance; distance++) {
    const ring = ringCells(grid, center, distance);
    if (ring.length > 0) {
      return ring[0];
    }
  }
  return null;
}

/**
 * Map a possibly invalid position onto a valid Free cell.
 *
 * @param grid Grid the agent lives on
 * @param cell Position as read from the scenario
 * @returns The position unchanged when already valid, otherwise the corrected
 *   cell together with the correction that was applied
 */
export function fixPosition(grid: Grid, cell: Cell): Result<FixedPosition, NoFreeCellError> {
  const clamped = clampCell(grid, cell);
  const wasClamped = !isInBounds(grid, cell);

  if (isFree(grid, clamped)) {
    if (!wasClamped) {
      return ok({ cell });
    }
    return ok({
      cell: clamped,
      correction: { original: cell, corrected: clamped, reason: 'out_of_bounds' },
    });
  }

  const nearest = findNearestFree(grid, clamped);
  if (!nearest) {
    return err(new NoFreeCellError(`No free cell available to correct (${cell.x},${cell.y})`));
  }

  const reason: CorrectionReason = wasClamped ? 'out_of_bounds_and_blocked' : 'blocked';
  return ok({
    cell: nearest,
    correction: { original: cell, corrected: nearest, reason },
  });
}
