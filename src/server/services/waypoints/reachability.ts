import { Cell, Grid, GridIndex } from '../../../shared/types/GridTypes';
import { getFreeNeighbors, isFree } from '../../../shared/utils/gridUtils';

const UNLABELED = -1;
const NO_CELLS: ReadonlyArray<Cell> = Object.freeze([]);

/**
 * Connected components of a map's Free cells under 4-directional moves.
 *
 * Every Free cell is labelled by one sweep when the index is built. Cells
 * reachable from a start are exactly the cells sharing its label, so all
 * agents starting in one component are handed the same row-major array.
 */
export class ReachabilityIndex {
  private readonly grid: Grid;
  private readonly labels: Int32Array;
  private readonly components: Cell[][] = [];

  constructor(index: GridIndex) {
    this.grid = index.grid;
    this.labels = new Int32Array(this.grid.width * this.grid.height).fill(UNLABELED);

    for (const cell of index.freeCells) {
      if (this.labels[this.offset(cell)] === UNLABELED) {
        this.flood(cell, this.components.length);
        this.components.push([]);
      }
    }
    // freeCells is row-major, so each component list is too
    for (const cell of index.freeCells) {
      this.components[this.labels[this.offset(cell)]].push(cell);
    }
  }

  get componentCount(): number {
    return this.components.length;
  }

  /** Component label of a Free cell, or -1 for a Blocked or out-of-bounds cell. */
  componentOf(cell: Cell): number {
    return isFree(this.grid, cell) ? this.labels[this.offset(cell)] : UNLABELED;
  }

  /**
   * Cells reachable from `start`, the start included, in row-major order.
   * Empty when `start` is out of bounds or Blocked; callers correct the start
   * first and treat an empty result as a zero-reachability agent.
   */
  reachableFrom(start: Cell): ReadonlyArray<Cell> {
    const label = this.componentOf(start);
    return label === UNLABELED ? NO_CELLS : this.components[label];
  }

  isReachable(from: Cell, to: Cell): boolean {
    const label = this.componentOf(from);
    return label !== UNLABELED && label === this.componentOf(to);
  }

  private offset(cell: Cell): number {
    return cell.y * this.grid.width + cell.x;
  }

  private flood(start: Cell, label: number): void {
    const queue: Cell[] = [start];
    this.labels[this.offset(start)] = label;

    // Index-based dequeue; shift() is O(n)
    for (let head = 0; head < queue.length; head++) {
      for (const next of getFreeNeighbors(this.grid, queue[head])) {
        const offset = this.offset(next);
        if (this.labels[offset] === UNLABELED) {
          this.labels[offset] = label;
          queue.push(next);
        }
      }
    }
  }
}
