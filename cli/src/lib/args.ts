export interface ParsedArgs {
  positionals: string[];
  /** Boolean flags such as --json. */
  flags: Set<string>;
  /** Repeatable value flags such as --input id=value, in order. */
  values: Map<string, string[]>;
}

const VALUE_FLAGS = new Set(['--input', '--record']);

export function parseArgs(args: string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags = new Set<string>();
  const values = new Map<string, string[]>();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (VALUE_FLAGS.has(arg) && i + 1 < args.length) {
      const list = values.get(arg) ?? [];
      list.push(args[++i]);
      values.set(arg, list);
    } else if (arg.startsWith('--')) {
      flags.add(arg);
    } else {
      positionals.push(arg);
    }
  }

  return { positionals, flags, values };
}

/**
 * Parse `id=value`. The value is read as JSON when it parses, otherwise
 * kept as a plain string. Returns null when there is no `=` or no id.
 */
export function parseInputAssignment(raw: string): [string, unknown] | null {
  const eq = raw.indexOf('=');
  if (eq <= 0) return null;

  const id = raw.slice(0, eq).trim();
  const text = raw.slice(eq + 1);
  if (!id) return null;

  try {
    return [id, JSON.parse(text)];
  } catch {
    return [id, text];
  }
}
