import type { Command } from 'commander';

export type MatchValue = string | boolean;

export interface MatchesInit {
  token: string;
  env?: NodeJS.ProcessEnv;
  sub?: ArgMatches;
}

/**
 * Raw option values matched at one level of the command path, keyed by
 * long option name, with the selected child level (if any) nested under it.
 */
export class ArgMatches {
  private constructor(
    readonly token: string,
    private readonly values: ReadonlyMap<string, MatchValue>,
    readonly env: NodeJS.ProcessEnv,
    private readonly sub: ArgMatches | undefined,
  ) {}

  static of(values: Record<string, MatchValue | undefined>, init: MatchesInit): ArgMatches {
    const map = new Map<string, MatchValue>();
    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) map.set(key, value);
    }
    return new ArgMatches(init.token, map, init.env ?? {}, init.sub);
  }

  /** Builds the matches for the whole path from the root down to `selected`. */
  static fromCommand(selected: Command, env: NodeJS.ProcessEnv): ArgMatches {
    const path: Command[] = [];
    for (let cmd: Command | null = selected; cmd; cmd = cmd.parent) {
      path.push(cmd);
    }
    let matches: ArgMatches | undefined;
    // innermost first so each level can nest the one below it
    for (const cmd of path) {
      const values: Record<string, MatchValue | undefined> = {};
      for (const opt of cmd.options) {
        const value: unknown = cmd.getOptionValue(opt.attributeName());
        if (typeof value === 'string' || typeof value === 'boolean') {
          values[opt.name()] = value;
        }
      }
      matches = ArgMatches.of(values, { token: cmd.name(), env, sub: matches });
    }
    if (!matches) {
      throw new Error('Command path is empty');
    }
    return matches;
  }

  value(key: string): MatchValue | undefined {
    return this.values.get(key);
  }

  /** The string value of `key`; flags and absent options yield undefined. */
  text(key: string): string | undefined {
    const value = this.values.get(key);
    return typeof value === 'string' ? value : undefined;
  }

  subcommand(): ArgMatches | undefined {
    return this.sub;
  }

  subcommandMatches(token: string): ArgMatches | undefined {
    return this.sub?.token === token ? this.sub : undefined;
  }

  /** Collapses the matched path into one level; deeper levels win. */
  flatten(): ArgMatches {
    const merged = new Map<string, MatchValue>(this.values);
    const deeper = this.sub?.flatten();
    if (deeper) {
      for (const [key, value] of deeper.values) merged.set(key, value);
    }
    return new ArgMatches(this.token, merged, this.env, undefined);
  }
}
