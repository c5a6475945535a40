/**
 * Shared grid utility functions
 *
 * Used by the map parser, reachability search, position corrector and the
 * post-hoc verifier. Cells are addressed as (x, y) with x the column.
 */

import { Cell, CellState, Grid } from '../types/GridTypes';

/**
 * 4-directional movement deltas. Order only affects BFS traversal order,
 * never the resulting reachable set.
 */
export const ORTHOGONAL_DELTAS: ReadonlyArray<readonly [number, number]> = [
  [0, 1],
  [0, -1],
  [1, 0],
  [-1, 0],
];

/** Stable string key for a cell, usable in Set and Map. */
export function cellKey(cell: Cell): string {
  return `${cell.x},${cell.y}`;
}

export function parseCellKey(key: string): Cell {
  const [x, y] = key.split(',').map(Number);
  return { x, y };
}

export function cellsEqual(a: Cell, b: Cell): boolean {
  return a.x === b.x && a.y === b.y;
}

export function isInBounds(grid: Grid, cell: Cell): boolean {
  if (!Number.isInteger(cell.x) || !Number.isInteger(cell.y)) return false;
  return cell.x >= 0 && cell.x < grid.width && cell.y >= 0 && cell.y < grid.height;
}

/** True only for in-bounds cells that are Free. */
export function isFree(grid: Grid, cell: Cell): boolean {
  return isInBounds(grid, cell) && grid.cells[cell.y][cell.x] === CellState.FREE;
}

/**
 * Free orthogonal neighbours of a cell.
 *
 * @param grid Grid to look up
 * @param cell Centre cell; need not be Free itself
 */
export function getFreeNeighbors(grid: Grid, cell: Cell): Cell[] {
  const neighbors: Cell[] = [];
  for (const [dx, dy] of ORTHOGONAL_DELTAS) {
    const next = { x: cell.x + dx, y: cell.y + dy };
    if (isFree(grid, next)) {
      neighbors.push(next);
    }
  }
  return neighbors;
}

export function clampCell(grid: Grid, cell: Cell): Cell {
  return {
    x: Math.max(0, Math.min(grid.width - 1, cell.x)),
    y: Math.max(0, Math.min(grid.height - 1, cell.y)),
  };
}
