import {
  RunCoordinator,
  WORKSPACE_CONTEXT_SOURCE,
  loadWorkspaceContext,
  recordSessionStart,
} from '../../../src/index.js';
import type { AgentReport, RunReport } from '../../../src/index.js';
import { parseArgs, parseInputAssignment } from '../lib/args.js';
import { openStack, printWarnings, reportError, stderrChannel } from '../lib/reader.js';
import { c } from '../lib/colours.js';

function statusLabel(report: AgentReport): string {
  switch (report.status) {
    case 'succeeded': return c.green + 'succeeded' + c.reset;
    case 'failed':    return c.red + (report.skipped ? 'failed (skipped)' : 'failed') + c.reset;
    default:          return c.grey + `${report.status}${report.skipped ? ' (skipped)' : ''}` + c.reset;
  }
}

function printReport(report: RunReport): void {
  const outcome = report.outcome === 'succeeded'
    ? c.green + 'succeeded' + c.reset
    : c.red + 'failed' + c.reset;
  console.log(c.bold + `Run of ${report.stack}` + c.reset + `  ${outcome}` + c.grey + `  (plan ${report.plan_version})` + c.reset);
  console.log('');

  if (report.agents.length === 0) {
    console.log(c.grey + 'Nothing to run: every agent is up to date.' + c.reset);
    return;
  }

  for (const a of report.agents) {
    const attempts = a.attempts > 1 ? c.grey + `  ${a.attempts} attempts` + c.reset : '';
    console.log(`  ${a.agent.padEnd(20)} ${statusLabel(a)}${attempts}`);
    if (a.error && !a.skipped) {
      console.log(`  ${''.padEnd(20)} ${c.dim}${a.error}${c.reset}`);
    }
  }

  for (const boundary of report.failure_boundaries) {
    console.log('');
    console.log(c.yellow + `Failure boundary: ${boundary.failed} → ${boundary.skipped.join(', ')}` + c.reset);
  }
}

export async function runCommand(args: string[]): Promise<void> {
  const { positionals, flags, values } = parseArgs(args);
  const json = flags.has('--json');

  try {
    const stackFs = await openStack(positionals[0], 'agent-stack run <stack-file> [--input id=value]... [--fresh] [--verbose] [--json]');
    if (!stackFs) return;

    const { graph, warnings } = await stackFs.loadStackGraph();
    const config = await stackFs.readRunnerConfig();
    const eventLog = stackFs.createEventLog(config);

    const externals: Record<string, unknown> = {};
    for (const raw of values.get('--input') ?? []) {
      const assignment = parseInputAssignment(raw);
      if (assignment === null) {
        console.error(`Error: --input expects <id>=<value>, got "${raw}"`);
        process.exitCode = 2;
        return;
      }
      externals[assignment[0]] = assignment[1];
    }

    const ctx = await loadWorkspaceContext(process.cwd());
    if (ctx !== null) {
      if (!(WORKSPACE_CONTEXT_SOURCE in externals)) {
        externals[WORKSPACE_CONTEXT_SOURCE] = ctx.document;
      }
      await recordSessionStart(eventLog, ctx, {
        stack: graph.name,
        cwd: process.cwd(),
        pid: process.pid,
      });
    }

    const initialState = flags.has('--fresh') ? null : await stackFs.readRunState();
    const coordinator = new RunCoordinator(graph, stackFs.createImplementationResolver(), {
      config,
      eventLog,
      outputChannel: stderrChannel(flags.has('--verbose')),
      externals,
      initialState: initialState ?? undefined,
    });

    if (initialState !== null) {
      // Values passed this time may differ from the last run's.
      const consumed = Object.fromEntries(
        Object.entries(externals).filter(([id]) => graph.externalConsumers.has(id)),
      );
      if (Object.keys(consumed).length > 0) await coordinator.refeedExternal(consumed);
      await coordinator.requeueFailed();
    }

    const report = await coordinator.run();
    await stackFs.writeRunState(coordinator.getRunState());

    if (json) {
      console.log(JSON.stringify(report, null, 2));
    } else {
      printReport(report);
      printWarnings(warnings);
    }
    process.exitCode = report.outcome === 'succeeded' ? 0 : 1;
  } catch (err) {
    reportError(err, json);
  }
}
