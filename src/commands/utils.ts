import { fetchWasmsArgs, initGenesisValidatorArgs, initNetworkArgs, joinNetworkArgs } from '../args/utils.js';
import { cmdSet, leaf, subCmd, type Parsed } from '../cli/command.js';

export const joinNetwork = leaf(
  'join-network',
  'Configure the node to join an existing network.',
  'join-network',
  joinNetworkArgs,
);
export const fetchWasms = leaf('fetch-wasms', 'Ensure pre-built WASM files are present.', 'fetch-wasms', fetchWasmsArgs);
export const initNetwork = leaf('init-network', 'Initialize a new test network.', 'init-network', initNetworkArgs);
export const initGenesisValidator = leaf(
  'init-genesis-validator',
  "Initialize a genesis validator's address, consensus key and validator account key for use in the ledger node.",
  'init-genesis-validator',
  initGenesisValidatorArgs,
);

/** Utilities run on the global arguments alone, without the chain context. */
export type UtilsCommand =
  | Parsed<typeof joinNetwork>
  | Parsed<typeof fetchWasms>
  | Parsed<typeof initNetwork>
  | Parsed<typeof initGenesisValidator>;

export const utils = subCmd(
  'utils',
  'Utilities.',
  cmdSet<UtilsCommand>([joinNetwork, fetchWasms, initNetwork, initGenesisValidator]),
);
