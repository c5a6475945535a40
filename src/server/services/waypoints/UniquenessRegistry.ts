import { Cell } from '../../../shared/types/GridTypes';
import { cellKey } from '../../../shared/utils/gridUtils';

/**
 * Waypoint cells already committed to some agent of one map.
 *
 * One instance per map run; created by the scenario builder and dropped when
 * the map is finished. Cells are only ever added.
 */
export class UniquenessRegistry {
  private committed = new Set<string>();

  has(cell: Cell): boolean {
    return this.committed.has(cellKey(cell));
  }

  /**
   * Commit a cell. Returns false when it was already present; the registry
   * is left unchanged in that case.
   */
  commit(cell: Cell): boolean {
    const key = cellKey(cell);
    if (this.committed.has(key)) {
      return false;
    }
    this.committed.add(key);
    return true;
  }

  get size(): number {
    return this.committed.size;
  }
}
