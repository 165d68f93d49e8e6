// Barrel export for agent-stack types and schemas

// AgentSpec
export {
  AGENT_NAME_PATTERN,
  ANY_TYPE,
  EXTERNAL_SOURCE_PREFIX,
  MAX_TIMEOUT_MS,
  AgentInputSchema,
  AgentOutputSchema,
  ImplementationRefSchema,
  AgentSpecSchema,
} from "./AgentSpec.js";
export type {
  AgentInput,
  AgentOutput,
  ImplementationRef,
  AgentSpec,
} from "./AgentSpec.js";

// Stack document and policies
export {
  RECOGNIZED_POLICIES,
  DEFAULT_POLICIES,
  isPolicyName,
  DataFlowAnnotationSchema,
  StackDocumentSchema,
} from "./StackDocument.js";
export type {
  PolicyName,
  StackPolicies,
  DataFlowAnnotation,
  StackDocument,
  ParsedStack,
} from "./StackDocument.js";

// Validation issues
export type {
  StackIssueCode,
  StackWarningCode,
  StackIssue,
  StackWarning,
} from "./StackIssue.js";

// Graph, plan and dirty set
export type {
  SourceRef,
  Edge,
  StackGraph,
  ExecutionPlan,
  DirtySet,
} from "./StackGraph.js";

// RunState
export {
  AgentStatusSchema,
  AgentRunStateSchema,
  RunStateSchema,
} from "./RunState.js";
export type {
  AgentStatus,
  AgentRunState,
  RunState,
} from "./RunState.js";

// RunReport
export type {
  AgentReport,
  RunFailure,
  FailureBoundary,
  RunReport,
} from "./RunReport.js";

// RunnerConfig
export { RunnerConfigSchema, DEFAULT_RUNNER_CONFIG } from "./RunnerConfig.js";
export type { RunnerConfig } from "./RunnerConfig.js";

// StackEvent
export { StackEventTypeSchema, StackEventSchema } from "./StackEvent.js";
export type { StackEventType, StackEvent } from "./StackEvent.js";

// WorkspaceContext
export { WorkspaceContextDocumentSchema } from "./WorkspaceContext.js";
export type {
  WorkspaceContextDocument,
  WorkspaceContext,
} from "./WorkspaceContext.js";

// AgentImplementation
export { isAgentResult } from "./AgentImplementation.js";
export type {
  AgentResult,
  AgentInvocationContext,
  AgentImplementation,
} from "./AgentImplementation.js";
