import { GenerationReport } from '../../services/waypoints/GenerationReport';
import { HierarchicalScenarioBuilder } from '../../services/waypoints/HierarchicalScenarioBuilder';
import { parseScenario } from '../../services/waypoints/scenarioFormat';
import { checkWaypointFile, compareWaypointFiles } from '../../services/waypoints/waypointVerifier';
import { agentLine, makeGridIndex, openRows, scenarioText, silenceConsole } from './helpers/testFixtures';

const BASE = '0\ttest.map\t5\t5\t0\t0\t4\t4\t8.0';

function file(lines: string[]): string {
  return ['version 1', ...lines].join('\n') + '\n';
}

describe('compareWaypointFiles', () => {
  it('should accept files whose smaller sequences are prefixes', () => {
    const smaller = file([`${BASE}\t1\t1\t0`, `${BASE}\t1\t3\t3`]);
    const larger = file([`${BASE}\t2\t1\t0\t2\t0`, `${BASE}\t2\t3\t3\t4\t1`]);

    expect(compareWaypointFiles(smaller, larger)).toEqual({
      agents: 2,
      matches: 2,
      mismatches: 0,
      passthroughLines: 0,
      issues: [],
    });
  });

  it('should report a sequence that is not a prefix', () => {
    const smaller = file([`${BASE}\t1\t1\t0`]);
    const larger = file([`${BASE}\t2\t2\t0\t1\t0`]);

    const result = compareWaypointFiles(smaller, larger);
    expect(result.mismatches).toBe(1);
    expect(result.issues).toEqual([
      { kind: 'prefix_mismatch', lineNumber: 2, message: "Waypoints of line 2 are not a prefix of the larger file's" },
    ]);
  });

  it('should report differing original fields', () => {
    const smaller = file([`${BASE}\t0`]);
    const larger = file(['0\ttest.map\t5\t5\t1\t0\t4\t4\t8.0\t0']);

    expect(compareWaypointFiles(smaller, larger).issues.map((issue) => issue.kind)).toEqual(['field_mismatch']);
  });

  it('should count lines copied through unchanged without flagging them', () => {
    const smaller = file([`${BASE}\t1\t1\t0`, '# note', `${BASE.slice(0, -4)}\tbad`]);
    const larger = file([`${BASE}\t2\t1\t0\t2\t0`, '# note', `${BASE.slice(0, -4)}\tbad`]);

    expect(compareWaypointFiles(smaller, larger)).toEqual({
      agents: 1,
      matches: 1,
      mismatches: 0,
      passthroughLines: 2,
      issues: [],
    });
  });

  it('should flag an unparsed line that differs between the files', () => {
    const smaller = file([`${BASE}\t1\t1\t0`, '# note']);
    const larger = file([`${BASE}\t2\t1\t0\t2\t0`, '# other note']);

    expect(compareWaypointFiles(smaller, larger).issues).toEqual([
      { kind: 'unparsed_line', lineNumber: 3, message: 'Line has no waypoint count' },
    ]);
  });

  it('should flag an agent line that only one file could parse', () => {
    const smaller = file([`${BASE}\t1\t1\t0`]);
    const larger = file([`${BASE}\t2\t1\t0`]);

    expect(compareWaypointFiles(smaller, larger).issues).toEqual([
      { kind: 'unparsed_line', lineNumber: 2, message: 'Waypoint count 2 needs 4 coordinates, found 2' },
    ]);
  });

  it('should accept generated outputs of a scenario with a copied-through line', () => {
    silenceConsole();
    const report = new GenerationReport(7, [2, 4]);
    const builder = new HierarchicalScenarioBuilder(
      'test',
      makeGridIndex(openRows(5, 5)),
      { globalSeed: 7, waypointCounts: [2, 4], correctGoals: false },
      report
    );
    const [built] = builder.build([
      parseScenario(scenarioText([agentLine({ x: 0, y: 0 }, { x: 4, y: 4 }), '# malformed note']), 'test/a.scen'),
    ]);
    jest.restoreAllMocks();

    expect(compareWaypointFiles(built.outputs.get(2) ?? '', built.outputs.get(4) ?? '')).toEqual({
      agents: 1,
      matches: 1,
      mismatches: 0,
      passthroughLines: 1,
      issues: [],
    });
  });

  it('should report different agent counts', () => {
    const result = compareWaypointFiles(file([`${BASE}\t0`]), file([`${BASE}\t0`, `${BASE}\t0`]));

    expect(result.issues).toEqual([{ kind: 'agent_count', message: 'Different number of agents (1 vs 2)' }]);
  });
});

describe('checkWaypointFile', () => {
  const index = makeGridIndex([
    '..@..',
    '..@..',
    '..@..',
  ]);

  it('should pass waypoints that are free and reachable', () => {
    const text = file([`${BASE.replace('\t0\t0\t4\t4', '\t0\t0\t1\t2')}\t2\t1\t0\t0\t2`]);

    expect(checkWaypointFile(index, text)).toEqual({ agents: 1, passthroughLines: 0, issues: [], overlaps: [] });
  });

  it('should flag blocked and unreachable waypoints', () => {
    const text = file([`${BASE}\t2\t2\t1\t4\t1`]);

    expect(checkWaypointFile(index, text).issues).toEqual([
      { kind: 'invalid_waypoint', lineNumber: 2, message: 'Waypoint (2,1) is not a free cell' },
      { kind: 'unreachable_waypoint', lineNumber: 2, message: 'Waypoint (4,1) is not reachable from (0,0)' },
    ]);
  });

  it('should flag a start on a blocked cell', () => {
    const text = file(['0\ttest.map\t5\t5\t2\t0\t0\t0\t1.0\t0']);

    expect(checkWaypointFile(index, text).issues).toEqual([
      { kind: 'invalid_start', lineNumber: 2, message: 'Start (2,0) is not a free cell' },
    ]);
  });

  it('should count copied-through lines instead of flagging them', () => {
    const text = file([`${BASE}\t1\t1\t0`, '# note', '']);

    expect(checkWaypointFile(index, text)).toEqual({ agents: 1, passthroughLines: 1, issues: [], overlaps: [] });
  });

  it('should list cells shared between agents without counting them as issues', () => {
    const text = file([`${BASE}\t1\t1\t1`, `${BASE}\t2\t0\t1\t1\t1`]);

    const result = checkWaypointFile(index, text);
    expect(result.issues).toEqual([]);
    expect(result.overlaps).toEqual([{ cell: { x: 1, y: 1 }, lineNumbers: [2, 3] }]);
  });
});
