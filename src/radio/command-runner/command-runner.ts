/**
 * Command Runner
 *
 * Runs an argument vector synchronously, without a shell, and reports the
 * outcome as a value. Non-zero exit, a missing executable and a timeout are
 * distinct outcomes. On timeout the child is signalled by the child-process
 * API; reaping it is not guaranteed here.
 */

import { spawnSync } from 'node:child_process';
import { createSubsystemLogger } from '../../logging/subsystem.js';

const log = createSubsystemLogger('radio/command-runner');

export const DEFAULT_COMMAND_TIMEOUT_MS = 10_000;

export interface RunOptions {
  timeoutMs?: number;
  /** Text written to the child's stdin */
  input?: string;
}

export type CommandResult =
  | { status: 'ok'; stdout: string; stderr: string }
  | { status: 'failed'; exitCode: number | null; signal: NodeJS.Signals | null; stdout: string; stderr: string }
  | { status: 'timeout'; timeoutMs: number }
  | { status: 'not_found'; command: string; message: string };

/** Anything that can execute an authorized argument vector */
export type CommandRunner = (argv: readonly string[], options?: RunOptions) => CommandResult;

function errorCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Runs a command and waits for it to finish or time out
 */
export const runCommand: CommandRunner = (argv, options = {}) => {
  const timeoutMs = options.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
  if (argv.length === 0) {
    return { status: 'not_found', command: '', message: 'Empty command' };
  }
  const [command, ...args] = argv;

  const result = spawnSync(command, args, {
    encoding: 'utf8',
    timeout: timeoutMs,
    input: options.input,
    shell: false,
  });

  if (result.error) {
    const code = errorCode(result.error);
    if (code === 'ETIMEDOUT') {
      log.warn('Command timed out', { command, timeoutMs });
      return { status: 'timeout', timeoutMs };
    }
    if (code === 'ENOENT') {
      log.warn('Command not found', { command });
      return { status: 'not_found', command, message: result.error.message };
    }
    log.error('Command could not be started', { command, error: result.error.message });
    return { status: 'failed', exitCode: null, signal: null, stdout: '', stderr: result.error.message };
  }

  const stdout = result.stdout ?? '';
  const stderr = result.stderr ?? '';
  if (result.status === 0) {
    log.debug('Command succeeded', { command });
    return { status: 'ok', stdout, stderr };
  }

  log.info('Command failed', { command, exitCode: result.status, signal: result.signal });
  return { status: 'failed', exitCode: result.status, signal: result.signal, stdout, stderr };
};
