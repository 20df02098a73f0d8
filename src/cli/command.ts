import { Command } from 'commander';
import type { Args } from '../args/descriptor.js';
import type { ArgMatches } from '../args/matches.js';
import { CliError, ErrorCodes } from '../output/errors.js';

/**
 * A command that can be mounted under any parent. `def` builds its commander
 * node; `parse` reads the parent's matches and yields a value only when this
 * node's token was the one selected.
 */
export interface SubCmd<T> {
  readonly token: string;
  def(): Command;
  parse(parent: ArgMatches): T | undefined;
}

/** An ordered set of sibling sub-commands attached to some parent. */
export interface Cmd<T> {
  readonly tokens: readonly string[];
  addSub(cmd: Command): Command;
  parse(matches: ArgMatches): T | undefined;
}

export type Parsed<N> = N extends SubCmd<infer T> ? T : N extends Cmd<infer T> ? T : never;

export interface CmdSetOptions {
  /** Child selected when the parent is invoked without a sub-command. */
  defaultChild?: string;
}

export function cmdSet<T>(children: ReadonlyArray<SubCmd<T>>, options: CmdSetOptions = {}): Cmd<T> {
  const tokens = children.map((child) => child.token);
  const duplicate = tokens.find((token, i) => tokens.indexOf(token) !== i);
  if (duplicate !== undefined) {
    throw new CliError(ErrorCodes.ERR_DEFINITION, `Duplicate sub-command token '${duplicate}'`);
  }
  if (options.defaultChild !== undefined && !tokens.includes(options.defaultChild)) {
    throw new CliError(ErrorCodes.ERR_DEFINITION, `Default sub-command '${options.defaultChild}' is not declared`);
  }
  return {
    tokens,
    addSub(cmd) {
      for (const child of children) {
        cmd.addCommand(child.def(), { isDefault: child.token === options.defaultChild });
      }
      return cmd;
    },
    parse(matches) {
      for (const child of children) {
        const parsed = child.parse(matches);
        if (parsed !== undefined) return parsed;
      }
      return undefined;
    },
  };
}

/** A terminal command carrying typed arguments. */
export function leaf<Tag extends string, A>(
  token: string,
  about: string,
  type: Tag,
  args: Args<A>,
): SubCmd<{ type: Tag; args: A }> {
  return {
    token,
    def: () => args.def(new Command(token).description(about)),
    parse(parent) {
      const matches = parent.subcommandMatches(token);
      return matches ? { type, args: args.parse(matches) } : undefined;
    },
  };
}

/** A terminal command without arguments of its own. */
export function bare<Tag extends string>(token: string, about: string, type: Tag): SubCmd<{ type: Tag }> {
  return {
    token,
    def: () => new Command(token).description(about),
    parse: (parent) => (parent.subcommandMatches(token) ? { type } : undefined),
  };
}

/** A nested command whose value is whatever its selected child yields. */
export function subCmd<T>(token: string, about: string, children: Cmd<T>): SubCmd<T> {
  return {
    token,
    def: () => children.addSub(new Command(token).description(about)),
    parse(parent) {
      const matches = parent.subcommandMatches(token);
      return matches ? children.parse(matches) : undefined;
    },
  };
}

export function mapSub<T, U>(node: SubCmd<T>, map: (value: T) => U): SubCmd<U> {
  return {
    token: node.token,
    def: () => node.def(),
    parse(parent) {
      const parsed = node.parse(parent);
      return parsed === undefined ? undefined : map(parsed);
    },
  };
}

export interface WithContext<T> {
  context: 'with';
  command: T;
}

export interface WithoutContext<T> {
  context: 'without';
  command: T;
}

/** Marks a command whose handler needs the loaded Context. */
export function withContext<T>(node: SubCmd<T>): SubCmd<WithContext<T>> {
  return mapSub(node, (command) => ({ context: 'with' as const, command }));
}

/** Marks a command that runs on global arguments alone. */
export function withoutContext<T>(node: SubCmd<T>): SubCmd<WithoutContext<T>> {
  return mapSub(node, (command) => ({ context: 'without' as const, command }));
}
