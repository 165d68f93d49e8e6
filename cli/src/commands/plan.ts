import { computeExecutionPlan } from '../../../src/index.js';
import { parseArgs } from '../lib/args.js';
import { openStack, printWarnings, reportError } from '../lib/reader.js';
import { c } from '../lib/colours.js';

export async function planCommand(args: string[]): Promise<void> {
  const { positionals, flags } = parseArgs(args);
  const json = flags.has('--json');

  try {
    const stackFs = await openStack(positionals[0], 'agent-stack plan <stack-file> [--json]');
    if (!stackFs) return;

    const { graph, warnings } = await stackFs.loadStackGraph();
    const plan = computeExecutionPlan(graph);

    if (json) {
      console.log(JSON.stringify(plan, null, 2));
      return;
    }

    console.log(c.bold + `Plan for ${plan.stack}` + c.reset + c.grey + `  (version ${plan.version})` + c.reset);
    const policies = Object.entries(graph.policies)
      .filter(([, enabled]) => enabled)
      .map(([name]) => name);
    console.log(`Policies: ${policies.length > 0 ? policies.join(', ') : 'none'}`);
    console.log('');
    plan.tiers.forEach((tier, i) => {
      console.log(`  ${c.cyan}Tier ${String(i + 1).padEnd(3)}${c.reset} ${tier.join(', ')}`);
    });
    printWarnings(warnings);
  } catch (err) {
    reportError(err, json);
  }
}
