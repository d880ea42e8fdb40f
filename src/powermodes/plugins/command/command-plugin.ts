/**
 * Command Plugin
 *
 * Runs a list of external commands in order. A command exiting non-zero is
 * reported as a warning (unless `warning-on-failure` is off) and never stops
 * the commands after it. Only a command that cannot be started at all fails
 * the plugin.
 */

import { ApplyError, CommandSpawnError, ConfigError, describeError } from '../../errors.js';
import {
  APPLIED,
  applyFailed,
  type ApplyContext,
  type ApplyResult,
  type ConfigureResult,
  type Plugin,
  type ValidatedConfig,
} from '../../plugin/plugin.js';
import {
  ChildProcessExecutor,
  describeCommand,
  type CommandExecutor,
  type CommandLine,
  type CommandResult,
} from '../../command-executor/command-executor.js';
import {
  expectSequence,
  expectTable,
  fieldPath,
  optionalBoolean,
  rejectUnknownKeys,
  validateWith,
} from '../../config/validation.js';
import { describeKind } from '../../config/config-value.js';
import type { ConfigTable, ConfigValue } from '../../types/config-value.js';

export const COMMAND_FIELDS = ['command', 'allow-stdin', 'show-stdout', 'show-stderr', 'warning-on-failure'] as const;

export interface CommandDescriptor {
  /** Shell string, or executable followed by its arguments */
  readonly command: CommandLine;
  readonly allowStdin: boolean;
  readonly showStdout: boolean;
  readonly showStderr: boolean;
  readonly warningOnFailure: boolean;
}

function parseCommandLine(value: ConfigValue | undefined, path: string): CommandLine {
  if (value === undefined) {
    throw new ConfigError('missing required field "command"', { path });
  }
  const commandPath = fieldPath(path, 'command');
  if (value.kind === 'string') {
    return value.value;
  }
  if (value.kind === 'sequence') {
    const argv = value.items.map((item, index) => {
      if (item.kind !== 'string') {
        throw new ConfigError(`"command" arguments must be strings, got ${describeKind(item)}`, {
          path: fieldPath(commandPath, index),
        });
      }
      return item.value;
    });
    if (argv.length === 0) {
      throw new ConfigError('"command" must not be an empty list', { path: commandPath });
    }
    return argv;
  }
  throw new ConfigError(`"command" must be a string or a list of strings, got ${describeKind(value)}`, {
    path: commandPath,
  });
}

export function parseCommandDescriptor(table: ConfigTable, path: string): CommandDescriptor {
  rejectUnknownKeys(table, COMMAND_FIELDS, path);
  return {
    command: parseCommandLine(table.entries.get('command'), path),
    allowStdin: optionalBoolean(table, 'allow-stdin', false, path),
    showStdout: optionalBoolean(table, 'show-stdout', false, path),
    showStderr: optionalBoolean(table, 'show-stderr', true, path),
    warningOnFailure: optionalBoolean(table, 'warning-on-failure', true, path),
  };
}

/**
 * Warning text for a command that ran but did not succeed. Captured stderr is
 * appended without its trailing newline.
 */
export function formatCommandFailure(index: number, descriptor: CommandDescriptor, result: CommandResult): string {
  const status = result.signal ? `was terminated by ${result.signal}` : `exited with code ${result.code ?? 'unknown'}`;
  let message = `command ${index + 1} (${describeCommand(descriptor.command)}) ${status}`;
  const stderr = result.stderr?.replace(/\r?\n$/, '');
  if (stderr) {
    message += `. stderr:\n${stderr}`;
  }
  return message;
}

export interface CommandPluginOptions {
  executor?: CommandExecutor;
}

export class CommandPlugin implements Plugin<CommandDescriptor[]> {
  readonly version = '1.0.0';
  readonly description = 'Runs external commands, through a shell or directly';

  private readonly executor: CommandExecutor;

  constructor(options: CommandPluginOptions = {}) {
    this.executor = options.executor ?? new ChildProcessExecutor();
  }

  configure(raw: ConfigValue): ConfigureResult<CommandDescriptor[]> {
    return validateWith(() =>
      expectSequence(raw, '', 'command list').items.map((item, index) => {
        const path = fieldPath('', index);
        return parseCommandDescriptor(expectTable(item, path, 'each command'), path);
      }),
    );
  }

  async apply(config: ValidatedConfig<CommandDescriptor[]>, context: ApplyContext): Promise<ApplyResult> {
    if (config.state === 'skipped') {
      return APPLIED;
    }

    const spawnErrors: ApplyError[] = [];
    for (const [index, descriptor] of config.value.entries()) {
      let result: CommandResult;
      try {
        result = await this.executor.run(descriptor);
      } catch (error) {
        context.logger.error('Command could not be started', { index, error: describeError(error) });
        spawnErrors.push(
          error instanceof ApplyError
            ? error
            : new CommandSpawnError(describeError(error), {
                attempted: `spawn ${describeCommand(descriptor.command)}`,
                cause: error,
              }),
        );
        continue;
      }

      if (result.code === 0) {
        context.logger.debug('Command succeeded', { index });
      } else if (descriptor.warningOnFailure) {
        context.warn(formatCommandFailure(index, descriptor, result));
      } else {
        context.logger.debug('Command failed, warning suppressed', { index, code: result.code });
      }
    }

    const [first, ...rest] = spawnErrors;
    if (first === undefined) {
      return APPLIED;
    }
    if (rest.length === 0) {
      return applyFailed(first);
    }
    return applyFailed(
      new ApplyError(`${spawnErrors.length} commands could not be started: ${spawnErrors.map((e) => e.message).join('; ')}`, {
        attempted: spawnErrors.map((e) => e.attempted).join(', '),
        cause: first,
      }),
    );
  }
}
