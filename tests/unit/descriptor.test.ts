import { describe, it, expect } from 'vitest';
import { Command } from 'commander';
import {
  AMOUNT,
  BASE_DIR,
  DRY_RUN_TX,
  FEE_TOKEN,
  LEDGER_ADDRESS_DEFAULT,
  SCHEME,
  SIGNING_KEY_OPT,
  WASM_DIR,
} from '../../src/args/catalog.js';
import { addOptions, arg, flag } from '../../src/args/descriptor.js';
import { ArgMatches } from '../../src/args/matches.js';
import { parseU64 } from '../../src/args/values.js';
import { WalletAddress } from '../../src/core/from-context.js';
import { ArgumentParseError, CliError } from '../../src/output/errors.js';

function matches(values: Record<string, string | boolean>, env: NodeJS.ProcessEnv = {}): ArgMatches {
  return ArgMatches.of(values, { token: 'test', env });
}

describe('argument descriptors', () => {
  describe('default precedence', () => {
    it('should prefer the command line over the environment', () => {
      const m = matches({ 'base-dir': '/from/cli' }, { MERIDIAN_BASE_DIR: '/from/env' });
      expect(BASE_DIR.parse(m)).toBe('/from/cli');
    });

    it('should fall back to the environment', () => {
      expect(BASE_DIR.parse(matches({}, { MERIDIAN_BASE_DIR: '/from/env' }))).toBe('/from/env');
    });

    it('should fall back to the static default last', () => {
      expect(BASE_DIR.parse(matches({}))).toBe('.meridian');
      expect(BASE_DIR.parse(matches({}, { MERIDIAN_BASE_DIR: '' }))).toBe('.meridian');
    });

    it('should leave an optional env argument unset when neither source has it', () => {
      expect(WASM_DIR.parse(matches({}))).toBeUndefined();
      expect(WASM_DIR.parse(matches({}, { MERIDIAN_WASM_DIR: '/wasm' }))).toBe('/wasm');
    });

    it('should run static defaults through the parser', () => {
      expect(LEDGER_ADDRESS_DEFAULT.parse(matches({}))).toEqual({ scheme: 'tcp', host: '127.0.0.1', port: 26657 });
      expect(SCHEME.parse(matches({}))).toBe('ed25519');
    });

    it('should produce an unresolved wallet reference for context defaults', () => {
      const token = FEE_TOKEN.parse(matches({}));
      expect(token).toBeInstanceOf(WalletAddress);
      expect(token.raw).toBe('MRD');
    });
  });

  describe('parse failures', () => {
    it('should report a missing required argument', () => {
      expect(() => AMOUNT.parse(matches({}))).toThrow("missing required argument '--amount'");
    });

    it('should carry the key, raw value and reason', () => {
      try {
        AMOUNT.parse(matches({ amount: '1.1234567' }));
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(ArgumentParseError);
        if (err instanceof ArgumentParseError) {
          expect(err.key).toBe('amount');
          expect(err.raw).toBe('1.1234567');
          expect(err.code).toBe('ERR_INVALID_ARGUMENT');
          expect(err.message).toBe("invalid value '1.1234567' for '--amount': At most 6 decimal places are allowed.");
        }
      }
    });

    it('should validate environment values too', () => {
      expect(() => BASE_DIR.parse(matches({}, { MERIDIAN_BASE_DIR: '   ' }))).toThrow(
        "invalid value '   ' for '--base-dir': Value must not be empty.",
      );
    });
  });

  describe('flags', () => {
    it('should be false when absent and true when given', () => {
      expect(DRY_RUN_TX.parse(matches({}))).toBe(false);
      expect(DRY_RUN_TX.parse(matches({ 'dry-run': true }))).toBe(true);
    });
  });

  describe('def', () => {
    it('should annotate defaults in the help text', () => {
      expect(LEDGER_ADDRESS_DEFAULT.def('Ledger.').description).toBe('Ledger. (default: 127.0.0.1:26657)');
      expect(BASE_DIR.def('Base.').description).toBe('Base. (env: MERIDIAN_BASE_DIR, default: .meridian)');
      expect(WASM_DIR.def('Wasm.').description).toBe('Wasm. (env: MERIDIAN_WASM_DIR)');
    });

    it('should make required arguments mandatory', () => {
      expect(AMOUNT.def('Amount.').mandatory).toBe(true);
      expect(SIGNING_KEY_OPT.def('Key.').mandatory).toBe(false);
    });

    it('should derive commander attribute names', () => {
      expect(SIGNING_KEY_OPT.attributeName).toBe('signingKey');
      expect(DRY_RUN_TX.flags).toBe('--dry-run');
      expect(AMOUNT.flags).toBe('--amount <amount>');
    });

    it('should reject invalid values while commander parses', () => {
      const epoch = arg('epoch', parseU64).opt();
      const cmd = new Command('probe').exitOverride().configureOutput({ writeErr: () => {} });
      addOptions(cmd, epoch.def('Epoch.'));
      expect(() => cmd.parse(['--epoch', 'soon'], { from: 'user' })).toThrow(
        "error: option '--epoch <epoch>' argument 'soon' is invalid. Expected a non-negative integer.",
      );
    });
  });

  describe('addOptions', () => {
    it('should reject a key declared twice on one command', () => {
      const cmd = new Command('dup');
      const verbose = flag('verbose');
      addOptions(cmd, verbose.def('Verbose.'));
      expect(() => addOptions(cmd, verbose.def('Again.'))).toThrow(CliError);
      expect(() => addOptions(cmd, verbose.def('Again.'))).toThrow("Duplicate argument '--verbose' on command 'dup'");
    });
  });
});
