/**
 * Command Executor
 *
 * Runs one external program and reports how it terminated. A string command
 * goes through `sh -c`; an argv command is spawned directly with no shell.
 * Unless stdin is allowed the child reads from a closed source, so it can
 * never block on interactive input.
 */

import { spawn, type StdioOptions } from 'node:child_process';
import { CommandSpawnError } from '../errors.js';
import { createSubsystemLogger } from '../../logging/subsystem.js';

/** Upper bound of captured stderr kept for failure reports */
export const STDERR_CAPTURE_LIMIT = 4096;

/** How long hidden stderr may keep draining after the child exited */
export const STDERR_DRAIN_MS = 200;

export type CommandLine = string | readonly string[];

export interface CommandInvocation {
  command: CommandLine;
  allowStdin: boolean;
  showStdout: boolean;
  showStderr: boolean;
}

export interface CommandResult {
  /** Exit code, or null when the child was terminated by a signal */
  code: number | null;
  signal: NodeJS.Signals | null;
  /** Tail of stderr, only when it was not shown */
  stderr?: string;
}

export interface CommandExecutor {
  run(invocation: CommandInvocation): Promise<CommandResult>;
}

export function describeCommand(command: CommandLine): string {
  return typeof command === 'string' ? command : command.join(' ');
}

function resolveArgv(command: CommandLine): [string, string[]] {
  if (typeof command === 'string') {
    return ['sh', ['-c', command]];
  }
  const [file, ...args] = command;
  if (file === undefined) {
    throw new CommandSpawnError('empty command', { attempted: 'spawn <empty>' });
  }
  return [file, args];
}

function keepTail(buffer: string, chunk: string): string {
  const next = buffer + chunk;
  return next.length > STDERR_CAPTURE_LIMIT ? next.slice(next.length - STDERR_CAPTURE_LIMIT) : next;
}

/**
 * Executor backed by `node:child_process`. The host's privileges and
 * environment are inherited unchanged.
 */
export class ChildProcessExecutor implements CommandExecutor {
  private readonly logger = createSubsystemLogger('powermodes/executor');

  run(invocation: CommandInvocation): Promise<CommandResult> {
    const attempted = `spawn ${describeCommand(invocation.command)}`;
    const stdio: StdioOptions = [
      invocation.allowStdin ? 'inherit' : 'ignore',
      invocation.showStdout ? 'inherit' : 'ignore',
      invocation.showStderr ? 'inherit' : 'pipe',
    ];

    return new Promise<CommandResult>((resolve, reject) => {
      const [file, args] = resolveArgv(invocation.command);
      this.logger.debug('Spawning command', { file, args });

      const child = spawn(file, args, { stdio });
      let stderr = '';
      let settled = false;

      child.stderr?.setEncoding('utf8');
      child.stderr?.on('data', (chunk: string) => {
        stderr = keepTail(stderr, chunk);
      });

      child.once('error', (error) => {
        if (settled) {
          return;
        }
        settled = true;
        this.logger.warn('Command could not be started', { file, error: error.message });
        reject(new CommandSpawnError(`could not run "${file}": ${error.message}`, { attempted, cause: error }));
      });

      child.once('exit', (code, signal) => {
        if (settled) {
          return;
        }
        let drainTimer: NodeJS.Timeout | undefined;
        const finish = () => {
          if (settled) {
            return;
          }
          settled = true;
          clearTimeout(drainTimer);
          child.stderr?.destroy();
          this.logger.debug('Command finished', { file, code, signal });
          resolve({
            code,
            signal,
            ...(invocation.showStderr ? {} : { stderr }),
          });
        };

        // Background processes started by the command may hold the pipe open.
        const pipe = child.stderr;
        if (!pipe || pipe.readableEnded) {
          finish();
          return;
        }
        drainTimer = setTimeout(finish, STDERR_DRAIN_MS);
        pipe.once('end', finish);
      });
    });
  }
}
