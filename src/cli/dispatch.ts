import { CommanderError, type Command } from 'commander';
import { globalArgs, type GlobalArgs } from '../args/global.js';
import { ArgMatches } from '../args/matches.js';
import { ArgumentParseError } from '../output/errors.js';
import { buildApp, type App } from './app.js';

/** Exit status for usage, parse and constraint errors. */
export const EXIT_USAGE = 2;

/** Process boundary used by the dispatcher; tests substitute their own. */
export interface CliIo {
  env: NodeJS.ProcessEnv;
  writeOut(text: string): void;
  writeErr(text: string): void;
  exit(code: number): never;
}

export function processIo(): CliIo {
  return {
    env: process.env,
    writeOut: (text) => {
      process.stdout.write(text);
    },
    writeErr: (text) => {
      process.stderr.write(text);
    },
    exit: (code) => process.exit(code),
  };
}

export interface ParsedInvocation<T> {
  command: T;
  /** The top-level sub-command token that was selected. */
  token: string;
  global: GlobalArgs;
}

interface Selection {
  command?: Command;
}

/**
 * Commander applies these settings per command, and `addCommand` does not
 * copy them from the parent, so every node is visited.
 */
function configureTree(cmd: Command, io: CliIo, selection: Selection): void {
  cmd
    .exitOverride()
    .configureOutput({ writeOut: io.writeOut, writeErr: io.writeErr })
    .allowExcessArguments(false);
  if (cmd.commands.length > 0) {
    cmd.enablePositionalOptions();
    for (const child of cmd.commands) {
      configureTree(child, io, selection);
    }
  } else {
    cmd.action(() => {
      selection.command = cmd;
    });
  }
}

function exitCodeFor(err: CommanderError): number {
  return err.code === 'commander.helpDisplayed' || err.code === 'commander.version' ? 0 : EXIT_USAGE;
}

/**
 * Parses `argv` (user arguments, without the executable) against `app`.
 * Returns the typed command, or prints usage or the parse error and exits.
 */
export function parseCommand<T>(app: App<T>, argv: readonly string[], io: CliIo): ParsedInvocation<T> {
  const program = buildApp(app);
  const selection: Selection = {};
  configureTree(program, io, selection);

  try {
    program.parse(argv, { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) {
      return io.exit(exitCodeFor(err));
    }
    throw err;
  }

  const usage = (): never => {
    io.writeErr(program.helpInformation());
    return io.exit(EXIT_USAGE);
  };
  if (!selection.command) {
    return usage();
  }

  const matches = ArgMatches.fromCommand(selection.command, io.env);
  try {
    const global = globalArgs.parse(matches);
    const command = app.commands.parse(matches);
    const token = matches.subcommand()?.token;
    if (command === undefined || token === undefined) {
      return usage();
    }
    return { command, token, global };
  } catch (err) {
    if (err instanceof ArgumentParseError) {
      io.writeErr(`error: ${err.message}\n`);
      return io.exit(EXIT_USAGE);
    }
    throw err;
  }
}
