#!/usr/bin/env node
import { helpCommand } from './commands/help.js';

const [,, command, ...args] = process.argv;

async function main(): Promise<void> {
  switch (command) {
    case 'validate':  await (await import('./commands/validate.js')).validateCommand(args); break;
    case 'plan':      await (await import('./commands/plan.js')).planCommand(args); break;
    case 'run':       await (await import('./commands/run.js')).runCommand(args); break;
    case 'propagate': await (await import('./commands/propagate.js')).propagateCommand(args); break;
    case 'context':   await (await import('./commands/context.js')).contextCommand(args); break;
    default:
      helpCommand();
      if (command !== undefined && command !== 'help') process.exitCode = 2;
  }
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.stack ?? err.message : String(err));
  process.exitCode = 1;
});
