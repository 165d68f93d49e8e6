import {
  StackFileSystem,
  contextEnvironment,
  formatShellExports,
  loadWorkspaceContext,
  recordSessionStart,
} from '../../../src/index.js';
import { parseArgs } from '../lib/args.js';
import { reportError } from '../lib/reader.js';
import { c } from '../lib/colours.js';

export async function contextCommand(args: string[]): Promise<void> {
  const { positionals, flags, values } = parseArgs(args);
  const dir = positionals[0] ?? process.cwd();

  try {
    const ctx = await loadWorkspaceContext(dir);
    // Silent: not every project has a context file.
    if (ctx === null) return;

    const stackFile = values.get('--record')?.[0];
    if (stackFile !== undefined) {
      const stackFs = await StackFileSystem.open(stackFile);
      const { graph } = await stackFs.loadStackGraph();
      const config = await stackFs.readRunnerConfig();
      await recordSessionStart(stackFs.createEventLog(config), ctx, {
        stack: graph.name,
        cwd: process.cwd(),
        pid: process.pid,
      });
    }

    if (flags.has('--export')) {
      console.log(formatShellExports(contextEnvironment(ctx)));
      return;
    }

    console.log('');
    console.log(c.bold + `KB Context: ${ctx.workspace}` + c.reset);
    console.log(`Context file: ${ctx.context_file}`);
    console.log(`Loaded contexts: ${ctx.context_count} areas`);
    console.log(c.green + '✓ Context loaded successfully' + c.reset);
    console.log('');
  } catch (err) {
    reportError(err, false);
  }
}
