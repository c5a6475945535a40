/**
 * GenerationReport: structured record of one generator run.
 *
 * Collects everything the run absorbed instead of failing on: skipped maps
 * and files, position corrections, degraded agents and fallback overlaps.
 * The CLI prints `summary()` and can dump `toJSON()` to a file.
 */

import { v4 as uuidv4 } from 'uuid';
import { Cell } from '../../../shared/types/GridTypes';
import { PositionCorrection } from '../../../shared/types/ScenarioTypes';

export interface AgentRef {
  mapName: string;
  scenarioKey: string;
  lineNumber: number;
}

export interface SkippedItem {
  path: string;
  code: string;
  reason: string;
}

export interface CorrectionEntry extends AgentRef, PositionCorrection {
  position: 'start' | 'goal';
}

export interface DegradedEntry extends AgentRef {
  reachable: number;
  requested: number;
}

export interface FallbackEntry extends AgentRef {
  cells: Cell[];
}

export interface GenerationSummary {
  runId: string;
  seed: number;
  waypointCounts: number[];
  mapsLoaded: number;
  mapsSkipped: number;
  scenariosProcessed: number;
  scenariosSkipped: number;
  agentsProcessed: number;
  positionsCorrected: number;
  agentsDegraded: number;
  agentsUnreachable: number;
  fallbackOverlaps: number;
  filesWritten: number;
  writesFailed: number;
}

export interface GenerationReportJson extends GenerationSummary {
  skippedMaps: SkippedItem[];
  skippedScenarios: SkippedItem[];
  failedWrites: SkippedItem[];
  corrections: CorrectionEntry[];
  degraded: DegradedEntry[];
  unreachable: AgentRef[];
  fallbacks: FallbackEntry[];
}

export class GenerationReport {
  readonly runId: string = uuidv4();

  private mapsLoaded = 0;
  private scenariosProcessed = 0;
  private agentsProcessed = 0;
  private filesWritten: string[] = [];
  private skippedMaps: SkippedItem[] = [];
  private skippedScenarios: SkippedItem[] = [];
  private failedWrites: SkippedItem[] = [];
  private corrections: CorrectionEntry[] = [];
  private degraded: DegradedEntry[] = [];
  private unreachable: AgentRef[] = [];
  private fallbacks: FallbackEntry[] = [];

  constructor(
    readonly seed: number,
    readonly waypointCounts: readonly number[]
  ) {}

  recordMapLoaded(): void {
    this.mapsLoaded++;
  }

  recordMapSkipped(path: string, code: string, reason: string): void {
    this.skippedMaps.push({ path, code, reason });
  }

  recordScenarioProcessed(agents: number): void {
    this.scenariosProcessed++;
    this.agentsProcessed += agents;
  }

  recordScenarioSkipped(path: string, code: string, reason: string): void {
    this.skippedScenarios.push({ path, code, reason });
  }

  recordCorrection(ref: AgentRef, position: 'start' | 'goal', correction: PositionCorrection): void {
    this.corrections.push({ ...ref, position, ...correction });
  }

  recordDegraded(ref: AgentRef, reachable: number, requested: number): void {
    this.degraded.push({ ...ref, reachable, requested });
  }

  recordUnreachable(ref: AgentRef): void {
    this.unreachable.push({ ...ref });
  }

  recordFallback(ref: AgentRef, cells: Cell[]): void {
    this.fallbacks.push({ ...ref, cells: cells.map((cell) => ({ ...cell })) });
  }

  recordFileWritten(path: string): void {
    this.filesWritten.push(path);
  }

  recordWriteFailed(path: string, reason: string): void {
    this.failedWrites.push({ path, code: 'SCENARIO_IO', reason });
  }

  /** True once at least one output file has been written. */
  hadOutput(): boolean {
    return this.filesWritten.length > 0;
  }

  getFallbacks(): ReadonlyArray<FallbackEntry> {
    return this.fallbacks;
  }

  getCorrections(): ReadonlyArray<CorrectionEntry> {
    return this.corrections;
  }

  getDegraded(): ReadonlyArray<DegradedEntry> {
    return this.degraded;
  }

  getUnreachable(): ReadonlyArray<AgentRef> {
    return this.unreachable;
  }

  getSkippedMaps(): ReadonlyArray<SkippedItem> {
    return this.skippedMaps;
  }

  getSkippedScenarios(): ReadonlyArray<SkippedItem> {
    return this.skippedScenarios;
  }

  summary(): GenerationSummary {
    return {
      runId: this.runId,
      seed: this.seed,
      waypointCounts: [...this.waypointCounts],
      mapsLoaded: this.mapsLoaded,
      mapsSkipped: this.skippedMaps.length,
      scenariosProcessed: this.scenariosProcessed,
      scenariosSkipped: this.skippedScenarios.length,
      agentsProcessed: this.agentsProcessed,
      positionsCorrected: this.corrections.length,
      agentsDegraded: this.degraded.length,
      agentsUnreachable: this.unreachable.length,
      fallbackOverlaps: this.fallbacks.length,
      filesWritten: this.filesWritten.length,
      writesFailed: this.failedWrites.length,
    };
  }

  toJSON(): GenerationReportJson {
    return {
      ...this.summary(),
      skippedMaps: [...this.skippedMaps],
      skippedScenarios: [...this.skippedScenarios],
      failedWrites: [...this.failedWrites],
      corrections: [...this.corrections],
      degraded: [...this.degraded],
      unreachable: [...this.unreachable],
      fallbacks: [...this.fallbacks],
    };
  }
}
