/**
 * CLI Parser
 *
 * Parses `geoalerts <command> [--key=value] [--flag] [args...]`.
 */

export const COMMANDS = [
  'create',
  'attach',
  'comment',
  'expire',
  'sweep',
  'show',
  'list',
  'export',
  'apply',
  'watch',
] as const;

export type CommandName = (typeof COMMANDS)[number];

export interface CliArgs {
  /** Null when no command (or an unknown one) was given */
  command: CommandName | null;
  /** The first non-option argument, as typed */
  rawCommand: string | null;
  /** `--key=value` options; a bare `--flag` is stored as `'true'` */
  options: Record<string, string>;
  /** Non-option arguments after the command */
  positionals: string[];
  /** Path from `--config=` */
  configPath: string | null;
}

export function isCommandName(value: string): value is CommandName {
  return COMMANDS.some((command) => command === value);
}

/**
 * Parse command-line arguments
 *
 * @param argv - Arguments after the executable and script (process.argv.slice(2))
 */
export function parseCliArgs(argv: string[]): CliArgs {
  const result: CliArgs = {
    command: null,
    rawCommand: null,
    options: {},
    positionals: [],
    configPath: null,
  };

  for (const arg of argv) {
    if (arg.startsWith('--')) {
      const body = arg.slice(2);
      if (body.length === 0) continue;
      const eq = body.indexOf('=');
      // Only the first '=' splits; values may contain more
      const key = eq === -1 ? body : body.slice(0, eq);
      const value = eq === -1 ? 'true' : body.slice(eq + 1);
      if (key === 'config') {
        result.configPath = value || null;
      } else if (key) {
        result.options[key] = value;
      }
      continue;
    }

    if (result.rawCommand === null) {
      result.rawCommand = arg;
      result.command = isCommandName(arg) ? arg : null;
    } else {
      result.positionals.push(arg);
    }
  }

  return result;
}
