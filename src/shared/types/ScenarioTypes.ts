import { Cell } from './GridTypes';

/**
 * One agent record from a scenario file.
 * Coordinates are already integers; `optimalLength` keeps its original text
 * so that output lines reproduce it byte for byte.
 */
export interface ScenarioAgent {
    lineNumber: number;
    bucket: string;
    mapName: string;
    width: number;
    height: number;
    start: Cell;
    goal: Cell;
    optimalLength: string;
}

export type ScenarioLine =
    | { kind: 'header'; lineNumber: number; raw: string }
    | { kind: 'blank'; lineNumber: number; raw: string }
    | { kind: 'passthrough'; lineNumber: number; raw: string; reason: string }
    | { kind: 'agent'; lineNumber: number; raw: string; agent: ScenarioAgent };

export interface ParsedScenario {
    scenarioKey: string;
    lines: ScenarioLine[];
}

export type CorrectionReason = 'out_of_bounds' | 'blocked' | 'out_of_bounds_and_blocked';

export interface PositionCorrection {
    original: Cell;
    corrected: Cell;
    reason: CorrectionReason;
}

/** Output unit: the first `waypointCount` cells of an agent's maximal sequence. */
export interface WaypointRecord {
    agent: ScenarioAgent;
    waypointCount: number;
    waypoints: Cell[];
}

/** An augmented scenario line read back from a generated file. */
export interface AugmentedAgentLine {
    lineNumber: number;
    originalFields: string[];
    waypoints: Cell[];
}
