import { z } from 'zod';
import { isPublicKey } from '../args/values.js';
import {
  NATIVE_TOKEN_ALIAS,
  getWalletPath,
  nativeTokenAddress,
  readValidated,
  writeChainFile,
  type ChainConfig,
} from './config.js';
import { fileExists } from './files.js';

const storedKeySchema = z.object({
  public_key: z.string().min(1),
  encrypted: z.boolean(),
});

export const walletFileSchema = z.object({
  version: z.literal(1),
  keys: z.record(storedKeySchema).default({}),
  addresses: z.record(z.string()).default({}),
});

export type WalletFile = z.infer<typeof walletFileSchema>;

export interface StoredKey {
  alias: string;
  publicKey: string;
  encrypted: boolean;
}

/**
 * Read-only view of a chain's wallet file: key and address aliases.
 * Aliases are matched case-insensitively.
 */
export class Wallet {
  private readonly keysByAlias = new Map<string, StoredKey>();
  private readonly addressesByAlias = new Map<string, string>();

  constructor(
    readonly path: string,
    file: WalletFile,
  ) {
    for (const [alias, key] of Object.entries(file.keys)) {
      this.keysByAlias.set(alias.toLowerCase(), {
        alias,
        publicKey: key.public_key.toLowerCase(),
        encrypted: key.encrypted,
      });
    }
    for (const [alias, address] of Object.entries(file.addresses)) {
      this.addressesByAlias.set(alias.toLowerCase(), address);
    }
  }

  static empty(): WalletFile {
    return { version: 1, keys: {}, addresses: {} };
  }

  /** Loads `<chainDir>/wallet.json`, creating it on first use, and seeds the native token alias. */
  static async load(chainDir: string, config: ChainConfig): Promise<Wallet> {
    const walletPath = getWalletPath(chainDir);
    let file: WalletFile;
    if (await fileExists(walletPath)) {
      file = await readValidated(walletPath, walletFileSchema);
    } else {
      file = Wallet.empty();
      file.addresses[NATIVE_TOKEN_ALIAS] = nativeTokenAddress(config);
      await writeChainFile(chainDir, walletPath, file);
    }
    const wallet = new Wallet(walletPath, file);
    if (!wallet.addressesByAlias.has(NATIVE_TOKEN_ALIAS.toLowerCase())) {
      wallet.addressesByAlias.set(NATIVE_TOKEN_ALIAS.toLowerCase(), nativeTokenAddress(config));
    }
    return wallet;
  }

  findAddress(alias: string): string | undefined {
    return this.addressesByAlias.get(alias.toLowerCase());
  }

  /** Finds a key by alias, or by its hex public key. */
  findKey(aliasOrPublicKey: string): StoredKey | undefined {
    const byAlias = this.keysByAlias.get(aliasOrPublicKey.toLowerCase());
    if (byAlias || !isPublicKey(aliasOrPublicKey)) return byAlias;
    const hex = aliasOrPublicKey.toLowerCase();
    return [...this.keysByAlias.values()].find((key) => key.publicKey === hex);
  }

  /** The alias an address is stored under, if any. */
  findAlias(address: string): string | undefined {
    const target = address.toLowerCase();
    for (const [alias, stored] of this.addressesByAlias) {
      if (stored.toLowerCase() === target) return alias;
    }
    return undefined;
  }

  keys(): StoredKey[] {
    return [...this.keysByAlias.values()];
  }

  addresses(): Array<{ alias: string; address: string }> {
    return [...this.addressesByAlias].map(([alias, address]) => ({ alias, address }));
  }
}
