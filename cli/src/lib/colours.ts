const enabled = process.stdout.isTTY === true && process.env['NO_COLOR'] === undefined;

const code = (value: string): string => (enabled ? value : '');

export const c = {
  reset:  code('\x1b[0m'),
  bold:   code('\x1b[1m'),
  dim:    code('\x1b[2m'),
  red:    code('\x1b[31m'),
  green:  code('\x1b[32m'),
  yellow: code('\x1b[33m'),
  cyan:   code('\x1b[36m'),
  grey:   code('\x1b[90m'),
};
// Usage: c.red + "text" + c.reset
// Empty strings when stdout is not a terminal or NO_COLOR is set.
