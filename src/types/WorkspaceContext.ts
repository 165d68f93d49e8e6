import { z } from "zod";

/**
 * Workspace context document (.kb-context/context.yaml).
 *
 * Only `workspace` is required; the list sections are handed to agents
 * untouched. Unknown keys are preserved.
 */
export const WorkspaceContextDocumentSchema = z
  .object({
    workspace: z.string().min(1),
    contexts: z.array(z.unknown()).default([]),
    people: z.array(z.unknown()).default([]),
    policies: z.array(z.unknown()).default([]),
    clues: z.array(z.unknown()).default([]),
  })
  .passthrough();
export type WorkspaceContextDocument = z.infer<typeof WorkspaceContextDocumentSchema>;

export interface WorkspaceContext {
  workspace: string;
  /** Absolute path of the context file that was loaded. */
  context_file: string;
  /** Entries in `contexts`; the other lists are not counted. */
  context_count: number;
  document: WorkspaceContextDocument;
}
