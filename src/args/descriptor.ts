import { InvalidArgumentError, Option, type Command } from 'commander';
import { ArgumentParseError, CliError, ErrorCodes } from '../output/errors.js';
import type { ArgMatches } from './matches.js';
import type { ValueParser } from './values.js';

export type Cardinality = 'required' | 'optional' | 'flag';

/**
 * Where a value comes from when the command line omits it. Defaults are kept
 * as text and run through the descriptor's own parser.
 */
export type DefaultSource =
  | { kind: 'none' }
  | { kind: 'static'; text: string }
  | { kind: 'env'; envVar: string; fallback?: string }
  | { kind: 'context'; text: string };

/** A typed group of arguments attached to a command and read back from its matches. */
export interface Args<T> {
  def(cmd: Command): Command;
  parse(matches: ArgMatches): T;
}

export abstract class Descriptor {
  abstract readonly cardinality: Cardinality;

  constructor(readonly key: string) {}

  abstract get flags(): string;

  get attributeName(): string {
    return new Option(this.flags).attributeName();
  }
}

export abstract class ValueArg<T> extends Descriptor {
  constructor(
    key: string,
    protected readonly parser: ValueParser<T>,
    readonly source: DefaultSource,
  ) {
    super(key);
  }

  get flags(): string {
    return `--${this.key} <${this.key}>`;
  }

  def(about: string): Option {
    return new Option(this.flags, `${about}${annotation(this.source)}`).argParser((raw: string) => {
      this.parser(raw);
      return raw;
    });
  }

  protected convert(raw: string): T {
    try {
      return this.parser(raw);
    } catch (err) {
      if (err instanceof InvalidArgumentError) {
        throw new ArgumentParseError(this.key, raw, err.message);
      }
      throw err;
    }
  }

  /** Command line first, then the environment when the source names a variable. */
  protected explicit(matches: ArgMatches): string | undefined {
    const cli = matches.text(this.key);
    if (cli !== undefined) return cli;
    if (this.source.kind === 'env') {
      const fromEnv = matches.env[this.source.envVar];
      if (fromEnv !== undefined && fromEnv !== '') return fromEnv;
    }
    return undefined;
  }
}

function annotation(source: DefaultSource): string {
  switch (source.kind) {
    case 'none':
      return '';
    case 'static':
    case 'context':
      return ` (default: ${source.text})`;
    case 'env':
      return source.fallback === undefined
        ? ` (env: ${source.envVar})`
        : ` (env: ${source.envVar}, default: ${source.fallback})`;
  }
}

export class Arg<T> extends ValueArg<T> {
  readonly cardinality = 'required';

  constructor(key: string, parser: ValueParser<T>) {
    super(key, parser, { kind: 'none' });
  }

  override def(about: string): Option {
    return super.def(about).makeOptionMandatory();
  }

  parse(matches: ArgMatches): T {
    const raw = matches.text(this.key);
    if (raw === undefined) {
      throw new ArgumentParseError(this.key, undefined, 'required');
    }
    return this.convert(raw);
  }

  opt(): ArgOpt<T> {
    return new ArgOpt(this.key, this.parser, { kind: 'none' });
  }

  /** Optional, read from `envVar` when the command line omits it. */
  envOpt(envVar: string): ArgOpt<T> {
    return new ArgOpt(this.key, this.parser, { kind: 'env', envVar });
  }

  default(text: string): ArgDefault<T> {
    return new ArgDefault(this.key, this.parser, { kind: 'static', text });
  }

  envDefault(envVar: string, fallback: string): ArgDefault<T> {
    return new ArgDefault(this.key, this.parser, { kind: 'env', envVar, fallback });
  }

  /** Default whose value is only meaningful once resolved against the context. */
  defaultFromCtx(text: string): ArgDefault<T> {
    return new ArgDefault(this.key, this.parser, { kind: 'context', text });
  }
}

export class ArgOpt<T> extends ValueArg<T> {
  readonly cardinality = 'optional';

  parse(matches: ArgMatches): T | undefined {
    const raw = this.explicit(matches);
    return raw === undefined ? undefined : this.convert(raw);
  }
}

export class ArgDefault<T> extends ValueArg<T> {
  readonly cardinality = 'optional';

  parse(matches: ArgMatches): T {
    const raw = this.explicit(matches) ?? this.fallbackText();
    if (raw === undefined) {
      throw new ArgumentParseError(this.key, undefined, 'no default available');
    }
    return this.convert(raw);
  }

  private fallbackText(): string | undefined {
    switch (this.source.kind) {
      case 'static':
      case 'context':
        return this.source.text;
      case 'env':
        return this.source.fallback;
      case 'none':
        return undefined;
    }
  }
}

export class ArgFlag extends Descriptor {
  readonly cardinality = 'flag';

  get flags(): string {
    return `--${this.key}`;
  }

  def(about: string): Option {
    return new Option(this.flags, about);
  }

  parse(matches: ArgMatches): boolean {
    return matches.value(this.key) === true;
  }
}

export function arg<T>(key: string, parser: ValueParser<T>): Arg<T> {
  return new Arg(key, parser);
}

export function flag(key: string): ArgFlag {
  return new ArgFlag(key);
}

/** Adds options to `cmd`, rejecting a long name the command already declares. */
export function addOptions(cmd: Command, ...options: Option[]): Command {
  for (const option of options) {
    if (cmd.options.some((existing) => existing.name() === option.name())) {
      throw new CliError(
        ErrorCodes.ERR_DEFINITION,
        `Duplicate argument '--${option.name()}' on command '${cmd.name()}'`,
      );
    }
    cmd.addOption(option);
  }
  return cmd;
}

export interface ArgGroup {
  name: string;
  args: readonly Descriptor[];
  /** At least one member must be given. */
  required: boolean;
  /** More than one member may be given together. */
  multiple: boolean;
}

/** Checks group membership after option parsing and before the command is accepted. */
export function addGroup(cmd: Command, group: ArgGroup): Command {
  return cmd.hook('preAction', (hooked) => {
    const present = group.args.filter((member) => hooked.getOptionValue(member.attributeName) !== undefined);
    const [first, second] = present;
    if (!group.multiple && first && second) {
      hooked.error(`error: option '${first.flags}' cannot be used with option '${second.flags}'`, {
        code: 'commander.conflictingOption',
      });
    }
    if (group.required && !first) {
      const names = group.args.map((member) => `'${member.flags}'`).join(', ');
      hooked.error(`error: one of the options ${names} is required (${group.name})`, {
        code: 'commander.missingRequiredGroup',
      });
    }
  });
}

