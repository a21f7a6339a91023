export { RepairRegistry, REPAIR_KINDS, isRepairKind } from './RepairRegistry.js';
export type { RepairKind, RepairSeverity, RepairIssue, RaiseOptions, RepairEvent } from './RepairRegistry.js';
