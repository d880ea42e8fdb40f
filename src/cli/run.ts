/**
 * CLI runner: turns parsed arguments into one action and an exit code.
 */

import { configTable, toPlainValue } from '../powermodes/config/config-value.js';
import { listModes, loadConfigFile, resolveMode } from '../powermodes/config/config-loader.js';
import { validateConfiguration } from '../powermodes/config/config-validator.js';
import { PowerModesError, describeError } from '../powermodes/errors.js';
import { ModeApplier, type ApplyStrategy } from '../powermodes/mode-applier/mode-applier.js';
import { createBuiltinRegistry } from '../powermodes/plugins/index.js';
import type { PluginRegistry } from '../powermodes/registry/plugin-registry.js';
import { ConsoleOutcomeReporter, type OutcomeReporter } from '../powermodes/reporter/outcome-reporter.js';
import type { Mode, ModeStatus } from '../powermodes/types/index.js';
import { createSubsystemLogger } from '../logging/subsystem.js';
import { logDebug, logError, logInfo, logSuccess, logWarn, setVerbose } from '../logger.js';
import { defaultRuntime, type RuntimeEnv } from '../runtime.js';
import { VERSION } from '../version.js';
import { helpText, parseArguments, UsageError, type CliAction } from './arguments.js';
import { selectModeInteractively, type ModeSelector } from './interactive.js';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_PARTIAL = 2;

export const ALLOW_NON_ROOT_ENV = 'POWERMODES_ALLOW_NON_ROOT';

const log = createSubsystemLogger('cli');

export interface CliDependencies {
  runtime?: RuntimeEnv;
  registry?: PluginRegistry;
  reporter?: OutcomeReporter;
  selectMode?: ModeSelector;
  isRoot?: () => boolean;
  env?: NodeJS.ProcessEnv;
  strategy?: ApplyStrategy;
}

export function exitCodeForStatus(status: ModeStatus): number {
  switch (status) {
    case 'success':
      return EXIT_SUCCESS;
    case 'partial':
      return EXIT_PARTIAL;
    case 'failed':
      return EXIT_FAILURE;
  }
}

function runningAsRoot(): boolean {
  return process.getuid?.() === 0;
}

class CliContext {
  readonly runtime: RuntimeEnv;
  private registryInstance?: PluginRegistry;

  constructor(private readonly deps: CliDependencies) {
    this.runtime = deps.runtime ?? defaultRuntime;
  }

  get registry(): PluginRegistry {
    this.registryInstance ??= this.deps.registry ?? createBuiltinRegistry();
    return this.registryInstance;
  }

  /** Returns false (after reporting) when root privileges are missing */
  checkRoot(): boolean {
    const env = this.deps.env ?? process.env;
    if (env[ALLOW_NON_ROOT_ENV] === '1') {
      return true;
    }
    if ((this.deps.isRoot ?? runningAsRoot)()) {
      return true;
    }
    logError('powermodes must be run as root!', this.runtime);
    return false;
  }

  async applyMode(mode: Mode): Promise<number> {
    const reporter = this.deps.reporter ?? new ConsoleOutcomeReporter(this.runtime);
    const applier = new ModeApplier(this.registry, reporter, { strategy: this.deps.strategy ?? 'parallel' });
    const outcome = await applier.applyMode(mode);
    for (const entry of outcome.outcomes) {
      logDebug(`${entry.plugin}: ${entry.kind} in ${entry.durationMs} ms`, this.runtime);
    }
    return exitCodeForStatus(outcome.status);
  }

  selectMode(modes: string[]): Promise<string> {
    return (this.deps.selectMode ?? selectModeInteractively)(modes);
  }
}

function listPlugins(context: CliContext): number {
  for (const { id, plugin, interactive } of context.registry.list()) {
    const suffix = interactive ? ' (interactive)' : '';
    logInfo(`${id} ${plugin.version}: ${plugin.description}${suffix}`, context.runtime);
  }
  return EXIT_SUCCESS;
}

function validate(context: CliContext, file: string): number {
  const report = validateConfiguration(loadConfigFile(file), context.registry);
  for (const warning of report.warnings) {
    logWarn(`Warning: ${warning.message}`, context.runtime);
  }
  for (const error of report.errors) {
    logError(`Error: ${error.message}`, context.runtime);
  }
  if (!report.valid) {
    logError('Configuration is invalid', context.runtime);
    return EXIT_FAILURE;
  }
  logSuccess(`Configuration is valid. Usable modes: ${report.usableModes.join(', ')}`, context.runtime);
  return EXIT_SUCCESS;
}

async function applyFromFile(context: CliContext, file: string, name: string): Promise<number> {
  if (!context.checkRoot()) {
    return EXIT_FAILURE;
  }
  const mode = resolveMode(loadConfigFile(file), name);
  return context.applyMode(mode);
}

async function interactive(context: CliContext, file: string): Promise<number> {
  if (!context.checkRoot()) {
    return EXIT_FAILURE;
  }
  const config = loadConfigFile(file);
  const modes = listModes(config);
  if (modes.length === 0) {
    logError(`No power modes in ${file}`, context.runtime);
    return EXIT_FAILURE;
  }
  const name = await context.selectMode(modes);
  return context.applyMode(resolveMode(config, name));
}

async function configurePlugin(context: CliContext, id: string): Promise<number> {
  if (!context.checkRoot()) {
    return EXIT_FAILURE;
  }
  const descriptor = context.registry.describe(id);
  if (!descriptor) {
    logError(`Unknown plugin "${id}"`, context.runtime);
    return EXIT_FAILURE;
  }
  if (!descriptor.plugin.interact) {
    logError(`Plugin "${id}" has no interactive configuration`, context.runtime);
    return EXIT_FAILURE;
  }
  const raw = await descriptor.plugin.interact();
  logDebug(`${id} = ${JSON.stringify(toPlainValue(raw))}`, context.runtime);
  return context.applyMode({ name: id, plugins: configTable([[id, raw]]) });
}

function runAction(context: CliContext, action: CliAction): number | Promise<number> {
  switch (action.kind) {
    case 'help':
      context.runtime.log(helpText());
      return EXIT_SUCCESS;
    case 'version':
      context.runtime.log(VERSION);
      return EXIT_SUCCESS;
    case 'list-plugins':
      return listPlugins(context);
    case 'validate':
      return validate(context, action.config);
    case 'apply':
      return applyFromFile(context, action.config, action.mode);
    case 'interactive':
      return interactive(context, action.config);
    case 'plugin':
      return configurePlugin(context, action.plugin);
  }
}

/**
 * Runs one CLI invocation and resolves to its exit code. Usage, configuration
 * and prompt errors are reported and map to a failure code; anything else
 * propagates.
 */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const context = new CliContext(deps);
  try {
    const { action, warnings, verbose } = parseArguments(argv);
    setVerbose(verbose);
    for (const warning of warnings) {
      logWarn(`Warning: ${warning}`, context.runtime);
    }
    log.debug('Running action', { action: action.kind });
    return await runAction(context, action);
  } catch (error) {
    if (error instanceof UsageError) {
      logError(`${error.message}. Run "powermodes --help" for usage.`, context.runtime);
      return EXIT_FAILURE;
    }
    if (error instanceof PowerModesError) {
      logError(describeError(error), context.runtime);
      return EXIT_FAILURE;
    }
    throw error;
  }
}

export async function main(argv: string[], runtime: RuntimeEnv = defaultRuntime): Promise<never> {
  let code: number;
  try {
    code = await runCli(argv, { runtime });
  } catch (error) {
    log.error('Unexpected error', { error: describeError(error) });
    logError(`Unexpected error: ${describeError(error)}`, runtime);
    code = EXIT_FAILURE;
  }
  return runtime.exit(code);
}
