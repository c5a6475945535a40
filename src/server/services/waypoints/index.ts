/**
 * Waypoint Services
 * Exports the waypoint generation pipeline for the CLI and scripts
 */

// Errors and reporting
export * from './errors';
export { GenerationReport } from './GenerationReport';
export type { GenerationSummary, GenerationReportJson } from './GenerationReport';
export {
  WaypointLogger,
  WaypointLogLevel,
  LOG_LEVEL_BY_NAME,
  setGlobalWaypointLogLevel,
  getGlobalWaypointLogLevel,
} from './WaypointLogger';

// Core algorithm
export { parseMap } from './mapParser';
export { ReachabilityIndex } from './reachability';
export { fixPosition } from './PositionCorrector';
export { UniquenessRegistry } from './UniquenessRegistry';
export { WaypointAssigner } from './WaypointAssigner';
export { deriveAgentSeed, createAgentRng } from './agentRng';
export { HierarchicalScenarioBuilder, normalizeWaypointCounts } from './HierarchicalScenarioBuilder';

// Files
export { parseScenario, formatAugmentedLine, parseAugmentedLine } from './scenarioFormat';
export { generateScenarioTree, loadMaps, outputDirFor } from './ScenarioTreeService';
export { compareWaypointFiles, checkWaypointFile } from './waypointVerifier';
