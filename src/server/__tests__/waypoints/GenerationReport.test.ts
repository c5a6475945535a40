import { GenerationReport } from '../../services/waypoints/GenerationReport';

describe('GenerationReport', () => {
  const ref = { mapName: 'room', scenarioKey: 'room/a.scen', lineNumber: 4 };

  it('should tag each run with a unique id', () => {
    const a = new GenerationReport(0, [0]);
    const b = new GenerationReport(0, [0]);

    expect(a.runId).toMatch(/^[0-9a-f-]{36}$/);
    expect(a.runId).not.toBe(b.runId);
  });

  it('should count what the run absorbed', () => {
    const report = new GenerationReport(7, [0, 2]);
    report.recordMapLoaded();
    report.recordMapSkipped('maps/bad.map', 'MALFORMED_MAP', 'Row 0 has 2 columns, header declares width 3');
    report.recordScenarioProcessed(3);
    report.recordScenarioProcessed(2);
    report.recordCorrection(ref, 'start', { original: { x: -1, y: 0 }, corrected: { x: 0, y: 0 }, reason: 'out_of_bounds' });
    report.recordDegraded(ref, 1, 2);
    report.recordFallback(ref, [{ x: 1, y: 1 }]);
    report.recordFileWritten('dst/room_0wp/a.scen');
    report.recordWriteFailed('dst/room_2wp/a.scen', 'EACCES');

    const { runId, ...summary } = report.summary();
    expect(runId).toBe(report.runId);
    expect(summary).toEqual({
      seed: 7,
      waypointCounts: [0, 2],
      mapsLoaded: 1,
      mapsSkipped: 1,
      scenariosProcessed: 2,
      scenariosSkipped: 0,
      agentsProcessed: 5,
      positionsCorrected: 1,
      agentsDegraded: 1,
      agentsUnreachable: 0,
      fallbackOverlaps: 1,
      filesWritten: 1,
      writesFailed: 1,
    });
  });

  it('should serialize full entries', () => {
    const report = new GenerationReport(1, [8]);
    report.recordFallback(ref, [{ x: 1, y: 1 }, { x: 2, y: 0 }]);

    const json = JSON.parse(JSON.stringify(report));
    expect(json.fallbacks).toEqual([{ ...ref, cells: [{ x: 1, y: 1 }, { x: 2, y: 0 }] }]);
    expect(json.corrections).toEqual([]);
  });

  it('should only report output once a file was written', () => {
    const report = new GenerationReport(0, [0]);
    expect(report.hadOutput()).toBe(false);

    report.recordWriteFailed('x', 'EACCES');
    expect(report.hadOutput()).toBe(false);

    report.recordFileWritten('y');
    expect(report.hadOutput()).toBe(true);
  });
});
