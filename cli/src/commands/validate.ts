import { validateStack } from '../../../src/index.js';
import { parseArgs } from '../lib/args.js';
import { openStack, printIssues, printWarnings, reportError } from '../lib/reader.js';
import { c } from '../lib/colours.js';

export async function validateCommand(args: string[]): Promise<void> {
  const { positionals, flags } = parseArgs(args);
  const json = flags.has('--json');

  try {
    const stackFs = await openStack(positionals[0], 'agent-stack validate <stack-file> [--json]');
    if (!stackFs) return;

    const result = validateStack(await stackFs.readStackDocument());

    if (json) {
      console.log(JSON.stringify({
        valid: result.ok,
        errors: result.ok ? [] : result.errors,
        warnings: result.warnings,
      }, null, 2));
    } else if (result.ok) {
      console.log(
        c.green + '✓ ' + c.reset +
        `stack "${result.graph.name}" is valid ` +
        `(${result.graph.agents.length} agents, ${result.graph.edges.length} edges)`,
      );
      printWarnings(result.warnings);
    } else {
      console.error(c.red + c.bold + `Invalid stack: ${stackFs.stackFilePath}` + c.reset);
      printIssues(result.errors);
      printWarnings(result.warnings);
    }

    process.exitCode = result.ok ? 0 : 1;
  } catch (err) {
    reportError(err, json);
  }
}
