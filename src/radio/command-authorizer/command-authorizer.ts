/**
 * Command Authorizer
 *
 * Flat allow-list for commands the management backend may execute locally.
 * A command is admitted only when its trimmed text fully matches one of the
 * patterns compiled at construction; lexing and alias substitution happen
 * after that check, never instead of it.
 */

import { parse as parseShell } from 'shell-quote';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import { CommandLexError, CommandNotAllowedError } from '../errors.js';

const log = createSubsystemLogger('radio/command-authorizer');

export type CommandSet = 'standard' | 'extended';

export const COMMAND_SETS: readonly CommandSet[] = ['standard', 'extended'];

/** Playback transport and bounded volume, then "play station N in bank M" */
const STANDARD_PATTERNS: readonly string[] = [
  String.raw`^mpc\s+(play|pause|stop|next|prev|volume\s+\d{1,3})$`,
  String.raw`^radio-play\s+\d+\s+\d+$`,
];

const EXTENDED_PATTERNS: readonly string[] = [
  ...STANDARD_PATTERNS,
  String.raw`^sudo\s+shutdown\s+-h\s+now$`,
];

export interface CommandAuthorizerOptions {
  /** Which whitelist to compile (default: standard) */
  commandSet?: CommandSet;
  /** Logical command name to executable, substituted for argv[0] */
  aliases?: Readonly<Record<string, string>>;
}

/**
 * Compiles the pattern table for a command set
 */
export function compileCommandPatterns(commandSet: CommandSet): readonly RegExp[] {
  const sources = commandSet === 'extended' ? EXTENDED_PATTERNS : STANDARD_PATTERNS;
  return Object.freeze(sources.map(source => new RegExp(source)));
}

/**
 * Splits a command line into arguments with shell quoting rules
 *
 * `$NAME` is kept literally, a `#` comment ends the line and control
 * operators (`;`, `|`, `&&`, redirects) are rejected.
 *
 * @throws CommandLexError
 */
export function splitCommandLine(command: string): string[] {
  const argv: string[] = [];
  for (const entry of parseShell(command, (name: string) => `$${name}`)) {
    if (typeof entry === 'string') {
      argv.push(entry);
    } else if ('comment' in entry) {
      break;
    } else if ('pattern' in entry) {
      argv.push(entry.pattern);
    } else {
      throw new CommandLexError(command, `unexpected shell operator '${entry.op}'`);
    }
  }
  return argv;
}

export class CommandAuthorizer {
  readonly commandSet: CommandSet;
  private readonly patterns: readonly RegExp[];
  private readonly aliases: ReadonlyMap<string, string>;

  constructor(options: CommandAuthorizerOptions = {}) {
    this.commandSet = options.commandSet ?? 'standard';
    this.patterns = compileCommandPatterns(this.commandSet);
    this.aliases = new Map(Object.entries(options.aliases ?? {}));
  }

  /**
   * Returns true when the trimmed command fully matches any pattern
   */
  isAllowed(command: string): boolean {
    const candidate = command.trim();
    return this.patterns.some(pattern => pattern.test(candidate));
  }

  /**
   * Splits a command and substitutes the argv[0] alias
   *
   * This does not authorize anything; call isAllowed first (or use authorize).
   *
   * @throws CommandLexError
   */
  toExecutable(command: string): string[] {
    const argv = splitCommandLine(command);
    const alias = argv.length > 0 ? this.aliases.get(argv[0]) : undefined;
    if (alias !== undefined) {
      argv[0] = alias;
    }
    return argv;
  }

  /**
   * Authorizes a command and returns its argument vector
   *
   * @throws CommandNotAllowedError when no pattern matches
   */
  authorize(command: string): string[] {
    if (!this.isAllowed(command)) {
      log.warn('Rejected command', { command });
      throw new CommandNotAllowedError(command);
    }
    return this.toExecutable(command.trim());
  }
}

export function createCommandAuthorizer(options: CommandAuthorizerOptions = {}): CommandAuthorizer {
  return new CommandAuthorizer(options);
}
