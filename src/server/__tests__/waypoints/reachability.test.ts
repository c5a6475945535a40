import { cellKey } from '../../../shared/utils/gridUtils';
import { ReachabilityIndex } from '../../services/waypoints/reachability';
import { makeGridIndex } from './helpers/testFixtures';

describe('ReachabilityIndex', () => {
  // Left pocket (column 0, rows 0-1) is walled off from the 3x3 block on the right
  const index = makeGridIndex([
    '.@...',
    '.@...',
    '@@...',
  ]);
  const reachability = new ReachabilityIndex(index);

  it('should include the start and every connected free cell', () => {
    const reachable = reachability.reachableFrom({ x: 2, y: 0 }).map(cellKey);

    expect(reachable).toHaveLength(9);
    expect(reachable).toContain('2,0');
    expect(reachable).toContain('4,2');
    expect(reachable).not.toContain('0,0');
  });

  it('should not cross blocked cells', () => {
    expect(reachability.reachableFrom({ x: 0, y: 0 })).toEqual([
      { x: 0, y: 0 },
      { x: 0, y: 1 },
    ]);
  });

  it('should return nothing for a blocked start', () => {
    expect(reachability.reachableFrom({ x: 1, y: 0 })).toEqual([]);
    expect(reachability.componentOf({ x: 1, y: 0 })).toBe(-1);
  });

  it('should return nothing for an out-of-bounds start', () => {
    expect(reachability.reachableFrom({ x: -1, y: 0 })).toEqual([]);
    expect(reachability.reachableFrom({ x: 0, y: 3 })).toEqual([]);
  });

  it('should not move diagonally', () => {
    const diagonal = new ReachabilityIndex(makeGridIndex([
      '.@',
      '@.',
    ]));

    expect(diagonal.componentCount).toBe(2);
    expect(diagonal.reachableFrom({ x: 0, y: 0 })).toEqual([{ x: 0, y: 0 }]);
  });

  it('should label each component once', () => {
    expect(reachability.componentCount).toBe(2);
    expect(reachability.componentOf({ x: 0, y: 1 })).toBe(0);
    expect(reachability.componentOf({ x: 3, y: 2 })).toBe(1);
  });

  it('should return the same list from any start in the component', () => {
    const fromCorner = reachability.reachableFrom({ x: 4, y: 2 });
    const fromEdge = reachability.reachableFrom({ x: 2, y: 1 });

    expect(fromEdge).toBe(fromCorner);
  });

  it('should list reachable cells in row-major order', () => {
    expect(reachability.reachableFrom({ x: 4, y: 2 }).map(cellKey)).toEqual([
      '2,0', '3,0', '4,0',
      '2,1', '3,1', '4,1',
      '2,2', '3,2', '4,2',
    ]);
  });

  it('should join cells around a winding wall into one component', () => {
    const winding = new ReachabilityIndex(makeGridIndex([
      '...@.',
      '.@.@.',
      '.@...',
    ]));

    expect(winding.componentCount).toBe(1);
    expect(winding.isReachable({ x: 0, y: 0 }, { x: 4, y: 0 })).toBe(true);
  });

  it('should tell whether two cells share a component', () => {
    expect(reachability.isReachable({ x: 0, y: 0 }, { x: 0, y: 1 })).toBe(true);
    expect(reachability.isReachable({ x: 0, y: 0 }, { x: 2, y: 0 })).toBe(false);
    expect(reachability.isReachable({ x: 1, y: 0 }, { x: 1, y: 0 })).toBe(false);
  });
});
