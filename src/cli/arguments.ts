import { Command, CommanderError } from 'commander';

export type CliAction =
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'list-plugins' }
  | { kind: 'validate'; config: string }
  | { kind: 'apply'; config: string; mode: string }
  | { kind: 'interactive'; config: string }
  | { kind: 'plugin'; plugin: string };

export interface ParsedArguments {
  action: CliAction;
  /** Non-fatal remarks about the command line, e.g. repeated options */
  warnings: string[];
  verbose: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

interface CliOptions {
  config: string[];
  mode: string[];
  validate?: boolean;
  interactive?: boolean;
  plugin?: string;
  listPlugins?: boolean;
  verbose?: boolean;
  version?: boolean;
  help?: boolean;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function createProgram(): Command {
  return new Command('powermodes')
    .description('Apply named power modes to this system')
    .helpOption(false)
    .option('-c, --config <file>', 'configuration file', collect, [])
    .option('-m, --mode <name>', 'apply a power mode', collect, [])
    .option('-v, --validate', 'validate the configuration file')
    .option('-i, --interactive', 'choose a power mode to apply interactively')
    .option('-p, --plugin <id>', "run a plugin's interactive configuration and apply it")
    .option('--list-plugins', 'list the available plugins')
    .option('--verbose', 'print per-plugin details')
    .option('--version', 'print the version')
    .option('-h, --help', 'print this help')
    .exitOverride()
    .configureOutput({
      writeOut: () => undefined,
      writeErr: () => undefined,
    });
}

export function helpText(): string {
  return createProgram().helpInformation();
}

/** Keeps the last of several values, warning about the ones dropped */
function lastOf(values: string[], what: string, warnings: string[]): string | undefined {
  const last = values.at(-1);
  if (values.length > 1 && last !== undefined) {
    warnings.push(`Multiple ${what} provided. Using the last one, "${last}".`);
  }
  return last;
}

export function parseArguments(argv: string[]): ParsedArguments {
  const program = createProgram();
  try {
    program.parse(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      throw new UsageError(error.message.replace(/^error: /, ''));
    }
    throw error;
  }
  if (program.args.length > 0) {
    throw new UsageError(`Unexpected argument "${program.args[0]}"`);
  }

  const options = program.opts<CliOptions>();
  const warnings: string[] = [];
  const config = lastOf(options.config, 'configuration files', warnings);
  const mode = lastOf(options.mode, 'power modes', warnings);

  const requested = [
    options.help && '--help',
    options.version && '--version',
    options.listPlugins && '--list-plugins',
    options.validate && '--validate',
    mode !== undefined && '--mode',
    options.interactive && '--interactive',
    options.plugin !== undefined && '--plugin',
  ].filter((flag): flag is string => typeof flag === 'string');

  if (requested.length > 1) {
    throw new UsageError(`Only one action can be performed at a time, got ${requested.join(', ')}`);
  }

  const requireConfig = (): string => {
    if (config === undefined) {
      throw new UsageError('No configuration file provided (use -c / --config)');
    }
    return config;
  };

  let action: CliAction;
  if (options.version) {
    action = { kind: 'version' };
  } else if (options.listPlugins) {
    action = { kind: 'list-plugins' };
  } else if (options.validate) {
    action = { kind: 'validate', config: requireConfig() };
  } else if (mode !== undefined) {
    action = { kind: 'apply', config: requireConfig(), mode };
  } else if (options.interactive) {
    action = { kind: 'interactive', config: requireConfig() };
  } else if (options.plugin !== undefined) {
    action = { kind: 'plugin', plugin: options.plugin };
  } else {
    action = { kind: 'help' };
  }

  return { action, warnings, verbose: options.verbose === true };
}
