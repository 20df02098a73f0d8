import { describe, it, expect } from 'vitest';
import { Command } from 'commander';
import { ArgMatches } from '../../src/args/matches.js';
import { bare, cmdSet, leaf, mapSub, subCmd, withContext, withoutContext } from '../../src/cli/command.js';
import { queryArgs } from '../../src/args/query.js';
import { CliError } from '../../src/output/errors.js';

/** Matches for `root <path...>` with the given option values at the deepest level. */
function path(tokens: string[], values: Record<string, string | boolean> = {}): ArgMatches {
  let matches: ArgMatches | undefined;
  for (let i = tokens.length - 1; i >= 0; i--) {
    const token = tokens[i] ?? '';
    matches = ArgMatches.of(i === tokens.length - 1 ? values : {}, { token, sub: matches });
  }
  return ArgMatches.of({}, { token: 'root', sub: matches });
}

type Demo = { type: 'alpha' } | { type: 'beta' };

describe('command nodes', () => {
  const alpha = bare('alpha', 'First.', 'alpha');
  const beta = bare('beta', 'Second.', 'beta');

  describe('cmdSet', () => {
    it('should reject duplicate sibling tokens', () => {
      expect(() => cmdSet<Demo>([alpha, bare('alpha', 'Again.', 'beta')])).toThrow(
        "Duplicate sub-command token 'alpha'",
      );
    });

    it('should reject an undeclared default child', () => {
      expect(() => cmdSet<Demo>([alpha, beta], { defaultChild: 'gamma' })).toThrow(CliError);
    });

    it('should attach children in declaration order', () => {
      const root = cmdSet<Demo>([beta, alpha]).addSub(new Command('root'));
      expect(root.commands.map((cmd) => cmd.name())).toEqual(['beta', 'alpha']);
    });

    it('should yield the child whose token was selected', () => {
      const set = cmdSet<Demo>([alpha, beta]);
      expect(set.parse(path(['beta']))).toEqual({ type: 'beta' });
      expect(set.parse(path(['gamma']))).toBeUndefined();
    });
  });

  describe('leaf', () => {
    it('should parse its arguments from its own level', () => {
      const epoch = leaf('epoch', 'Epoch.', 'query-epoch', queryArgs);
      expect(epoch.parse(path(['epoch'], { 'ledger-address': '10.0.0.2:26657' }))).toEqual({
        type: 'query-epoch',
        args: { ledgerAddress: { scheme: 'tcp', host: '10.0.0.2', port: 26657 } },
      });
    });
  });

  describe('subCmd', () => {
    it('should reuse the same children at any depth', () => {
      const nested = subCmd('group', 'Group.', cmdSet<Demo>([alpha, beta]));
      const outer = subCmd('outer', 'Outer.', cmdSet<Demo>([nested]));
      expect(nested.parse(path(['group', 'alpha']))).toEqual({ type: 'alpha' });
      expect(outer.parse(path(['outer', 'group', 'beta']))).toEqual({ type: 'beta' });
    });

    it('should register the default child with commander', () => {
      const group = subCmd('group', 'Group.', cmdSet<Demo>([alpha, beta], { defaultChild: 'beta' })).def();
      expect(group.commands.map((cmd) => cmd.name())).toEqual(['alpha', 'beta']);
    });
  });

  describe('wrappers', () => {
    it('should map parsed values', () => {
      const wrapped = mapSub(alpha, (command) => ({ type: 'wrapped' as const, command }));
      expect(wrapped.token).toBe('alpha');
      expect(wrapped.parse(path(['alpha']))).toEqual({ type: 'wrapped', command: { type: 'alpha' } });
    });

    it('should tag context requirements', () => {
      expect(withContext(alpha).parse(path(['alpha']))).toEqual({ context: 'with', command: { type: 'alpha' } });
      expect(withoutContext(beta).parse(path(['beta']))).toEqual({ context: 'without', command: { type: 'beta' } });
      expect(withContext(alpha).parse(path(['beta']))).toBeUndefined();
    });
  });
});

describe('ArgMatches', () => {
  it('should let deeper levels win when flattened', () => {
    const leafLevel = ArgMatches.of({ 'chain-id': 'leaf' }, { token: 'epoch' });
    const root = ArgMatches.of({ 'chain-id': 'root', mode: 'full' }, { token: 'root', sub: leafLevel });
    const flat = root.flatten();
    expect(flat.text('chain-id')).toBe('leaf');
    expect(flat.text('mode')).toBe('full');
    expect(flat.subcommand()).toBeUndefined();
  });

  it('should read values from the selected commander path', () => {
    const root = new Command('root').option('--mode <mode>');
    const child = new Command('child').option('--dry-run');
    root.addCommand(child);
    child.action(() => {});
    root.parse(['--mode', 'seed', 'child', '--dry-run'], { from: 'user' });

    const matches = ArgMatches.fromCommand(child, { HOME: '/home/test' });
    expect(matches.token).toBe('root');
    expect(matches.text('mode')).toBe('seed');
    expect(matches.subcommandMatches('child')?.value('dry-run')).toBe(true);
    expect(matches.subcommand()?.env.HOME).toBe('/home/test');
  });
});
