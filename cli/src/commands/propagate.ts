import {
  EXTERNAL_SOURCE_PREFIX,
  computeDirtySet,
  computeExecutionPlan,
  computeExternalDirtySet,
  tierIndex,
} from '../../../src/index.js';
import { parseArgs } from '../lib/args.js';
import { openStack, reportError } from '../lib/reader.js';
import { c } from '../lib/colours.js';

export async function propagateCommand(args: string[]): Promise<void> {
  const { positionals, flags } = parseArgs(args);
  const json = flags.has('--json');
  const [file, ...changed] = positionals;

  try {
    const stackFs = await openStack(file, 'agent-stack propagate <stack-file> <changed...> [--json]');
    if (!stackFs) return;
    if (changed.length === 0) {
      console.error('Usage: agent-stack propagate <stack-file> <changed...> [--json]');
      process.exitCode = 2;
      return;
    }

    const { graph } = await stackFs.loadStackGraph();
    const plan = computeExecutionPlan(graph);

    const agents = changed.filter((name) => !name.startsWith(EXTERNAL_SOURCE_PREFIX));
    const externals = changed
      .filter((name) => name.startsWith(EXTERNAL_SOURCE_PREFIX))
      .map((name) => name.slice(EXTERNAL_SOURCE_PREFIX.length));

    const dirty = new Set<string>();
    if (agents.length > 0) {
      for (const name of computeDirtySet(graph, plan, agents).dirty) dirty.add(name);
    }
    if (externals.length > 0) {
      for (const name of computeExternalDirtySet(graph, plan, externals).dirty) dirty.add(name);
    }
    const ordered = plan.tiers.flat().filter((name) => dirty.has(name));

    if (json) {
      console.log(JSON.stringify({ changed, dirty: ordered }, null, 2));
      return;
    }

    console.log(`Changed: ${changed.join(', ')}`);
    if (ordered.length === 0) {
      console.log(c.grey + 'Nothing downstream needs to re-run.' + c.reset);
      return;
    }

    console.log(`Dirty set (${ordered.length} agent${ordered.length === 1 ? '' : 's'}):`);
    const tiers = tierIndex(plan);
    const byTier = new Map<number, string[]>();
    for (const name of ordered) {
      const t = tiers.get(name) ?? 0;
      byTier.set(t, [...(byTier.get(t) ?? []), name]);
    }
    for (const [t, names] of byTier) {
      console.log(`  ${c.cyan}Tier ${String(t + 1).padEnd(3)}${c.reset} ${names.join(', ')}`);
    }
  } catch (err) {
    reportError(err, json);
  }
}
