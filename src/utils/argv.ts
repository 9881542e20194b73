/**
 * Minimal argv splitting shared by the entry point and the commands
 */

export type ParsedArgs = {
  positionals: string[];
  flags: Record<string, string | boolean>;
};

/**
 * Split arguments into positionals and flags. `--name=value` always takes a
 * value, `--name value` only for names listed in `valueFlags`, `--no-name`
 * sets `name` to false and `-x` sets `x` to true. Everything after `--` is
 * positional.
 */
export function parseArgs(args: readonly string[], valueFlags: readonly string[] = []): ParsedArgs {
  const positionals: string[] = [];
  const flags: Record<string, string | boolean> = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--') {
      positionals.push(...args.slice(i + 1));
      break;
    }
    if (arg.startsWith('--')) {
      const body = arg.slice(2);
      const eq = body.indexOf('=');
      if (eq !== -1) {
        flags[body.slice(0, eq)] = body.slice(eq + 1);
      } else if (valueFlags.includes(body) && i + 1 < args.length) {
        flags[body] = args[++i];
      } else if (body.startsWith('no-')) {
        flags[body.slice(3)] = false;
      } else {
        flags[body] = true;
      }
      continue;
    }
    if (arg.startsWith('-') && arg.length > 1) {
      for (const ch of arg.slice(1)) flags[ch] = true;
      continue;
    }
    positionals.push(arg);
  }

  return { positionals, flags };
}

export function stringFlag(parsed: ParsedArgs, name: string): string | undefined {
  const value = parsed.flags[name];
  return typeof value === 'string' ? value : undefined;
}

export function booleanFlag(parsed: ParsedArgs, name: string): boolean | undefined {
  const value = parsed.flags[name];
  if (typeof value === 'boolean') return value;
  if (value === 'true') return true;
  if (value === 'false') return false;
  return undefined;
}
