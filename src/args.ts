/**
 * Parsed command line: a command plus the options every command accepts
 */
export interface CliArgs {
  command: string;
  dryRun: boolean;
  recordsPath?: string;
  mappingPath?: string;
}

export function parseCliArgs(argv: string[]): CliArgs {
  const args: CliArgs = { command: 'help', dryRun: false };
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--dry-run') {
      args.dryRun = true;
    } else if (arg === '--records' || arg === '--mapping') {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new Error(`${arg} requires a path`);
      }
      if (arg === '--records') {
        args.recordsPath = value;
      } else {
        args.mappingPath = value;
      }
      i++;
    } else if (arg.startsWith('--')) {
      throw new Error(`Unknown option: ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  if (positional.length > 0) {
    args.command = positional[0];
  }
  return args;
}
