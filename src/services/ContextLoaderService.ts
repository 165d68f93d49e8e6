/**
 * ContextLoaderService — workspace context as an external data source
 *
 * Looks for `.kb-context/context.yaml` in a directory. Not every project
 * has one, so absence is silent (null). A file without a `workspace`
 * is an error.
 *
 * The loaded document is fed to agents through `external:workspace_context`.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { parse as parseYaml } from "yaml";
import { WorkspaceContextDocumentSchema } from "../types/index.js";
import type { WorkspaceContext } from "../types/index.js";
import { WorkspaceContextError } from "../errors/index.js";
import type { EventLogLike } from "./EventLogService.js";
import { isFsError } from "./StackFileSystem.js";

export const CONTEXT_DIR = ".kb-context";
export const CONTEXT_FILENAME = "context.yaml";

/** External source id under which the context document is exposed. */
export const WORKSPACE_CONTEXT_SOURCE = "workspace_context";

export function contextFilePath(dir: string): string {
  return path.join(path.resolve(dir), CONTEXT_DIR, CONTEXT_FILENAME);
}

/**
 * Load the workspace context for `dir`.
 *
 * @returns null when the directory has no context file
 * @throws WorkspaceContextError — unparseable file or no workspace defined
 */
export async function loadWorkspaceContext(dir: string): Promise<WorkspaceContext | null> {
  const filePath = contextFilePath(dir);

  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (isFsError(err, "ENOENT")) return null;
    throw err;
  }

  let json: unknown;
  try {
    json = parseYaml(raw);
  } catch (err) {
    throw new WorkspaceContextError(
      filePath,
      err instanceof Error ? err.message : String(err),
    );
  }

  const result = WorkspaceContextDocumentSchema.safeParse(json);
  if (!result.success) {
    const workspaceIssue = result.error.issues.some((i) => i.path[0] === "workspace");
    throw new WorkspaceContextError(
      filePath,
      workspaceIssue || typeof json !== "object" || json === null
        ? "file exists but workspace is not defined"
        : result.error.issues.map((i) => `[${i.path.join(".")}] ${i.message}`).join("; "),
    );
  }

  return {
    workspace: result.data.workspace,
    context_file: filePath,
    context_count: result.data.contexts.length,
    document: result.data,
  };
}

/** Environment variables that tell agents which context is loaded. */
export function contextEnvironment(ctx: WorkspaceContext): Record<string, string> {
  return {
    KB_CONTEXT_FILE: ctx.context_file,
    KB_WORKSPACE: ctx.workspace,
    KB_LOADED: "true",
  };
}

/** Render variables as POSIX shell `export` lines, double-quoted. */
export function formatShellExports(env: Record<string, string>): string {
  return Object.entries(env)
    .map(([key, value]) => `export ${key}="${value.replace(/(["\\$`])/g, "\\$1")}"`)
    .join("\n");
}

/**
 * Append a `session_started` record for a loaded context.
 */
export async function recordSessionStart(
  eventLog: EventLogLike,
  ctx: WorkspaceContext,
  options: { stack: string; cwd: string; pid: number; now?: Date },
): Promise<void> {
  await eventLog.append({
    timestamp: (options.now ?? new Date()).toISOString(),
    stack: options.stack,
    event: "session_started",
    detail: {
      session_id: `code-${options.pid}`,
      workspace: ctx.workspace,
      context_file: ctx.context_file,
      pwd: options.cwd,
    },
  });
}
