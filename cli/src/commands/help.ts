export function helpCommand(): void {
  console.log(`agent-stack — declarative agent-stack planner and runner

Usage: agent-stack <command> [options]

Commands:
  validate <stack-file>              Check a stack declaration
    --json                             Print { valid, errors, warnings }
  plan <stack-file>                  Print the execution tiers
    --json                             Print the plan as JSON
  run <stack-file>                   Execute the stack
    --input <id>=<value>               Value for external:<id> (repeatable; JSON or text)
    --fresh                            Ignore the persisted run state
    --verbose                          Log retries and skips to stderr
    --json                             Print the run report as JSON
  propagate <stack-file> <changed...> Print the agents that must re-run
                                       (use external:<id> for re-fed sources)
    --json                             Print the dirty set as JSON
  context [dir]                      Show the workspace context (.kb-context/context.yaml)
    --export                           Print shell export lines instead
    --record <stack-file>              Append a session_started event to the stack's log

Examples:
  agent-stack validate stack.yaml
  agent-stack run stack.yaml --input topic='"release notes"' --verbose
  agent-stack propagate stack.yaml loader external:workspace_context`);
}
