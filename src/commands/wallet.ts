import {
  addressAddArgs,
  addressOrAliasFindArgs,
  keyAndAddressGenArgs,
  keyExportArgs,
  keyFindArgs,
  keyListArgs,
} from '../args/wallet.js';
import { bare, cmdSet, leaf, subCmd, type Parsed } from '../cli/command.js';

export const keyGen = leaf(
  'gen',
  'Generate a new keypair with an implicit address and store it in the wallet.',
  'key-gen',
  keyAndAddressGenArgs,
);
export const keyFind = leaf('find', 'Search for a keypair in the wallet by alias or public key.', 'key-find', keyFindArgs);
export const keyList = leaf('list', 'List all known keys.', 'key-list', keyListArgs);
export const keyExport = leaf('export', 'Export a keypair to a file.', 'key-export', keyExportArgs);

export type WalletKeyCommand =
  | Parsed<typeof keyGen>
  | Parsed<typeof keyFind>
  | Parsed<typeof keyList>
  | Parsed<typeof keyExport>;

export const key = subCmd(
  'key',
  'Manage keys stored in the wallet.',
  cmdSet<WalletKeyCommand>([keyGen, keyFind, keyList, keyExport]),
);

export const addressGen = leaf(
  'gen',
  'Generate a new keypair with an implicit address and store it in the wallet.',
  'address-gen',
  keyAndAddressGenArgs,
);
export const addressFind = leaf(
  'find',
  'Find an address by its alias, or an alias by its address.',
  'address-find',
  addressOrAliasFindArgs,
);
export const addressList = bare('list', 'List all known addresses.', 'address-list');
export const addressAdd = leaf('add', 'Store an alias for an address in the wallet.', 'address-add', addressAddArgs);

export type WalletAddressCommand =
  | Parsed<typeof addressGen>
  | Parsed<typeof addressFind>
  | Parsed<typeof addressList>
  | Parsed<typeof addressAdd>;

export const address = subCmd(
  'address',
  'Manage addresses stored in the wallet.',
  cmdSet<WalletAddressCommand>([addressGen, addressFind, addressList, addressAdd]),
);

export type WalletCommand = WalletKeyCommand | WalletAddressCommand;

export const walletCommands = cmdSet<WalletCommand>([key, address]);
