/**
 * Minimal `--key value` / `--key=value` argument scanner shared by the CLI
 * entry points. Values are validated by each command's zod schema.
 */

export interface ScannedArgs {
  options: Record<string, string>;
  flags: Set<string>;
  positionals: string[];
}

/**
 * @param argv Arguments after the script name
 * @param booleanFlags Option names that never take a value
 */
export function scanArgs(argv: readonly string[], booleanFlags: readonly string[]): ScannedArgs {
  const options: Record<string, string> = {};
  const flags = new Set<string>();
  const positionals: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }

    const body = arg.slice(2);
    const eq = body.indexOf('=');
    if (eq >= 0) {
      options[body.slice(0, eq)] = body.slice(eq + 1);
    } else if (booleanFlags.includes(body)) {
      flags.add(body);
    } else if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
      options[body] = argv[++i];
    } else {
      // Missing value; the schema reports it
      options[body] = '';
    }
  }

  return { options, flags, positionals };
}
