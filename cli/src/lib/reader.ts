import {
  CycleError,
  PolicyConflictError,
  StackFileNotFoundError,
  StackFileSystem,
  StackValidationError,
  UnknownReferenceError,
  WorkspaceContextError,
} from '../../../src/index.js';
import type { OutputChannelLike, StackIssue, StackWarning } from '../../../src/index.js';
import { c } from './colours.js';

export function printIssues(issues: StackIssue[]): void {
  for (const issue of issues) {
    const agents = issue.agents.length > 0 ? `  ${c.grey}(${issue.agents.join(', ')})${c.reset}` : '';
    console.error(`  ${c.red}${issue.code.padEnd(18)}${c.reset} ${issue.message}${agents}`);
  }
}

export function printWarnings(warnings: StackWarning[]): void {
  for (const warning of warnings) {
    console.error(`  ${c.yellow}${warning.code.padEnd(18)}${c.reset} ${warning.message}`);
  }
}

/**
 * Report a failure from any command and set a non-zero exit code.
 * Structural errors keep their structure under --json.
 */
export function reportError(err: unknown, json: boolean): void {
  process.exitCode = 1;

  if (json) {
    const body: Record<string, unknown> = {
      error: err instanceof Error ? err.name : 'Error',
      message: err instanceof Error ? err.message : String(err),
    };
    if (err instanceof StackValidationError || err instanceof PolicyConflictError) {
      body['issues'] = err.issues;
    }
    if (err instanceof CycleError) body['cycle'] = err.cycle;
    if (err instanceof UnknownReferenceError) body['references'] = err.references;
    console.log(JSON.stringify(body, null, 2));
    return;
  }

  if (err instanceof StackValidationError) {
    console.error(c.red + c.bold + `Invalid stack: ${err.source}` + c.reset);
    printIssues(err.issues);
  } else if (err instanceof PolicyConflictError) {
    console.error(c.red + c.bold + 'Policy conflict' + c.reset);
    printIssues(err.issues);
  } else if (err instanceof StackFileNotFoundError) {
    console.error(`Error: stack file not found — ${err.path}`);
  } else if (err instanceof WorkspaceContextError) {
    console.error(c.yellow + `Warning: ${err.message}` + c.reset);
  } else {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/** Open the stack file named by the first positional, or print usage. */
export async function openStack(
  file: string | undefined,
  usage: string,
): Promise<StackFileSystem | null> {
  if (!file) {
    console.error(`Usage: ${usage}`);
    process.exitCode = 2;
    return null;
  }
  return StackFileSystem.open(file);
}

/** Output channel writing dimmed lines to stderr, or nothing. */
export function stderrChannel(verbose: boolean): OutputChannelLike {
  return {
    appendLine: (value: string) => {
      if (verbose) console.error(c.dim + value + c.reset);
    },
  };
}
