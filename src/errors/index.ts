export { StackValidationError, zodIssuesToStackIssues } from "./StackValidationError.js";
export type { IssueAgentResolver } from "./StackValidationError.js";
export { UnknownReferenceError } from "./UnknownReferenceError.js";
export { CycleError } from "./CycleError.js";
export { ExecutionError } from "./ExecutionError.js";
export { PolicyConflictError } from "./PolicyConflictError.js";
export { StackFileNotFoundError } from "./StackFileNotFoundError.js";
export { StackWriteError } from "./StackWriteError.js";
export { IllegalTransitionError } from "./IllegalTransitionError.js";
export { WorkspaceContextError } from "./WorkspaceContextError.js";
