export { DeploymentCoordinator, CoordinatorNotRunningError } from './DeploymentCoordinator.js';
export type { DeploymentCoordinatorOptions, PhaseTimeouts, StateListener } from './DeploymentCoordinator.js';
export { DriftDetector } from './DriftDetector.js';
export type { DriftDetectorOptions, DriftReportHandler } from './DriftDetector.js';
export { CrashMarker } from './CrashMarker.js';
export type { CrashMarkerRecord, CrashMarkerReadResult } from './CrashMarker.js';
export { WorkingTreeMutex } from './WorkingTreeMutex.js';
export {
  planReload,
  matchesPattern,
  normalizePath,
  isReloadDomain,
  RELOAD_RULES,
  RELOAD_DOMAINS,
  INPUT_HELPER_DOMAINS,
} from './ReloadPlanner.js';
export type { ReloadDomain, ReloadPlan, ReloadRule } from './ReloadPlanner.js';
export * from './errors.js';
export * from './types.js';
