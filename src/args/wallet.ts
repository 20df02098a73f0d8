import {
  ALIAS,
  ALIAS_OPT,
  DECRYPT,
  RAW_ADDRESS,
  RAW_ADDRESS_OPT,
  RAW_PUBLIC_KEY_OPT,
  SCHEME,
  UNSAFE_DONT_ENCRYPT,
  UNSAFE_SHOW_SECRET,
  VALUE,
} from './catalog.js';
import { addGroup, addOptions, type Args } from './descriptor.js';
import type { SchemeType } from './values.js';

export interface KeyAndAddressGen {
  scheme: SchemeType;
  alias?: string;
  unsafeDontEncrypt: boolean;
}

export const keyAndAddressGenArgs: Args<KeyAndAddressGen> = {
  def(cmd) {
    return addOptions(
      cmd,
      SCHEME.def('The type of key to generate: ed25519 or secp256k1.'),
      ALIAS_OPT.def('The key and address alias. Defaults to the public key hash.'),
      UNSAFE_DONT_ENCRYPT.def('UNSAFE: Do not encrypt the keypair. Do not use this for keys used in a live network.'),
    );
  },
  parse(matches) {
    return {
      scheme: SCHEME.parse(matches),
      alias: ALIAS_OPT.parse(matches),
      unsafeDontEncrypt: UNSAFE_DONT_ENCRYPT.parse(matches),
    };
  },
};

export interface KeyFind {
  publicKey?: string;
  alias?: string;
  /** A public key or alias. */
  value?: string;
  unsafeShowSecret: boolean;
}

export const keyFindArgs: Args<KeyFind> = {
  def(cmd) {
    return addOptions(
      cmd,
      RAW_PUBLIC_KEY_OPT.def('A public key associated with the keypair.').conflicts([
        ALIAS_OPT.attributeName,
        VALUE.attributeName,
      ]),
      ALIAS_OPT.def('An alias associated with the keypair.').conflicts(VALUE.attributeName),
      VALUE.def('A public key or alias associated with the keypair.'),
      UNSAFE_SHOW_SECRET.def('UNSAFE: Print the secret key.'),
    );
  },
  parse(matches) {
    return {
      publicKey: RAW_PUBLIC_KEY_OPT.parse(matches),
      alias: ALIAS_OPT.parse(matches),
      value: VALUE.parse(matches),
      unsafeShowSecret: UNSAFE_SHOW_SECRET.parse(matches),
    };
  },
};

export interface KeyList {
  decrypt: boolean;
  unsafeShowSecret: boolean;
}

export const keyListArgs: Args<KeyList> = {
  def(cmd) {
    return addOptions(
      cmd,
      DECRYPT.def('Decrypt keys that are encrypted.'),
      UNSAFE_SHOW_SECRET.def('UNSAFE: Print the secret keys.'),
    );
  },
  parse(matches) {
    return { decrypt: DECRYPT.parse(matches), unsafeShowSecret: UNSAFE_SHOW_SECRET.parse(matches) };
  },
};

export interface KeyExport {
  alias: string;
}

export const keyExportArgs: Args<KeyExport> = {
  def(cmd) {
    return addOptions(cmd, ALIAS.def('The alias of the key to export.'));
  },
  parse(matches) {
    return { alias: ALIAS.parse(matches) };
  },
};

/** Exactly one of the two is given. */
export interface AddressOrAliasFind {
  alias?: string;
  address?: string;
}

export const addressOrAliasFindArgs: Args<AddressOrAliasFind> = {
  def(cmd) {
    addOptions(
      cmd,
      ALIAS_OPT.def('An alias associated with the address.'),
      RAW_ADDRESS_OPT.def('The bech32m encoded address string.'),
    );
    return addGroup(cmd, { name: 'find_flags', args: [ALIAS_OPT, RAW_ADDRESS_OPT], required: true, multiple: false });
  },
  parse(matches) {
    return { alias: ALIAS_OPT.parse(matches), address: RAW_ADDRESS_OPT.parse(matches) };
  },
};

export interface AddressAdd {
  alias: string;
  address: string;
}

export const addressAddArgs: Args<AddressAdd> = {
  def(cmd) {
    return addOptions(
      cmd,
      ALIAS.def('An alias to be associated with the address.'),
      RAW_ADDRESS.def('The bech32m encoded address string.'),
    );
  },
  parse(matches) {
    return { alias: ALIAS.parse(matches), address: RAW_ADDRESS.parse(matches) };
  },
};
