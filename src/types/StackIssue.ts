/**
 * Structured validation findings. Errors make a declaration invalid;
 * warnings are reported alongside a valid graph.
 */
export type StackIssueCode =
  | "parse"
  | "schema"
  | "duplicate_name"
  | "duplicate_output"
  | "invalid_source"
  | "unknown_reference"
  | "type_mismatch"
  | "fan_in"
  | "data_flow_mismatch"
  | "policy_conflict"
  | "cycle";

export type StackWarningCode = "unknown_policy" | "layer_inversion";

export interface StackIssue {
  code: StackIssueCode;
  message: string;
  /** Offending agent names, in declaration order where it applies. */
  agents: string[];
  /** Ordered cycle path closing on its first agent (cycle issues only). */
  cycle?: string[];
  /** Policy name (policy_conflict issues only). */
  policy?: string;
  /** Location inside the document, e.g. `stack.agents.2.inputs.0.source`. */
  path?: string;
}

export interface StackWarning {
  code: StackWarningCode;
  message: string;
  agents: string[];
  path?: string;
}
