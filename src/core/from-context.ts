import { isAddress, isPublicKey, parseText } from '../args/values.js';
import { CliError, ErrorCodes } from '../output/errors.js';
import type { StoredKey, Wallet } from './wallet.js';

/**
 * An argument value that names something in the wallet (an alias, or a raw
 * value that may also be an alias). It stays unresolved until a Context is
 * available; see `Context.get`.
 */
export interface FromContext<T> {
  readonly raw: string;
  resolve(wallet: Wallet): T;
  toJSON(): string;
}

export abstract class WalletRef<T> implements FromContext<T> {
  constructor(readonly raw: string) {}

  abstract resolve(wallet: Wallet): T;

  toJSON(): string {
    return this.raw;
  }

  toString(): string {
    return this.raw;
  }
}

function unknownAlias(kind: string, raw: string): CliError {
  return new CliError(ErrorCodes.ERR_UNKNOWN_ALIAS, `Unknown ${kind} alias: ${raw}`);
}

/** An address, or an alias of one in the wallet. */
export class WalletAddress extends WalletRef<string> {
  static parse(raw: string): WalletAddress {
    return new WalletAddress(parseText(raw));
  }

  resolve(wallet: Wallet): string {
    if (isAddress(this.raw)) return this.raw.toLowerCase();
    const found = wallet.findAddress(this.raw);
    if (found === undefined) throw unknownAlias('address', this.raw);
    return found;
  }
}

/** A key alias or public key naming a keypair held in the wallet. */
export class WalletKeypair extends WalletRef<StoredKey> {
  static parse(raw: string): WalletKeypair {
    return new WalletKeypair(parseText(raw));
  }

  resolve(wallet: Wallet): StoredKey {
    const found = wallet.findKey(this.raw);
    if (!found) throw unknownAlias('key', this.raw);
    return found;
  }
}

/** A hex public key, or the alias of a key in the wallet. */
export class WalletPublicKey extends WalletRef<string> {
  static parse(raw: string): WalletPublicKey {
    return new WalletPublicKey(parseText(raw));
  }

  resolve(wallet: Wallet): string {
    if (isPublicKey(this.raw)) return this.raw.toLowerCase();
    const found = wallet.findKey(this.raw);
    if (!found) throw unknownAlias('key', this.raw);
    return found.publicKey;
  }
}
