export { StackFileSystem, isFsError } from "./StackFileSystem.js";
export {
  validateStack,
  assertValidStack,
  resolvePolicies,
} from "./SchemaValidatorService.js";
export type { ValidationResult } from "./SchemaValidatorService.js";
export {
  buildStackGraph,
  parseSourceRef,
  formatSourceRef,
  agentFingerprint,
  downstreamOf,
  findCycles,
} from "./GraphBuilderService.js";
export { computeExecutionPlan, planVersion, tierIndex } from "./ExecutionPlannerService.js";
export { computeDirtySet, computeExternalDirtySet } from "./PropagationService.js";
export {
  canTransition,
  createRunState,
  transitionAgent,
  updateAgent,
  markDirty,
  reconcileRunState,
} from "./RunStateService.js";
export type { ReconcileResult } from "./RunStateService.js";
export { RunCoordinator, computeBackoffDelay } from "./RunCoordinatorService.js";
export type { OutputChannelLike, RunCoordinatorOptions } from "./RunCoordinatorService.js";
export { FileEventLog, NULL_EVENT_LOG, parseEventLines } from "./EventLogService.js";
export type { EventLogLike } from "./EventLogService.js";
export {
  ModuleImplementationResolver,
  MapImplementationResolver,
} from "./ImplementationResolver.js";
export type { ImplementationResolverLike } from "./ImplementationResolver.js";
export {
  CONTEXT_DIR,
  CONTEXT_FILENAME,
  WORKSPACE_CONTEXT_SOURCE,
  contextFilePath,
  loadWorkspaceContext,
  contextEnvironment,
  formatShellExports,
  recordSessionStart,
} from "./ContextLoaderService.js";
