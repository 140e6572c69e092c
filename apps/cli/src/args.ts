/**
 * Flags shared by every command.
 */

export interface CommonArgs {
  /** Value of --config / -c, if given. */
  configPath?: string;
  /** Flags the command itself should look at. */
  rest: string[];
}

export function parseCommonArgs(args: readonly string[]): CommonArgs {
  let configPath: string | undefined;
  const rest: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;

    if (arg === '--config' || arg === '-c') {
      configPath = args[i + 1];
      i++;
      continue;
    }
    if (arg.startsWith('--config=')) {
      configPath = arg.slice('--config='.length);
      continue;
    }
    rest.push(arg);
  }

  return { configPath, rest };
}
