import {
  ALIAS,
  ALLOW_DUPLICATE_IP,
  ARCHIVE_DIR,
  CHAIN_ID,
  CHAIN_ID_PREFIX,
  COMMISSION_RATE,
  CONSENSUS_TIMEOUT_COMMIT,
  DONT_ARCHIVE,
  DONT_PREFETCH_WASM,
  GENESIS_PATH,
  GENESIS_VALIDATOR,
  LOCALHOST,
  MAX_COMMISSION_RATE_CHANGE,
  NET_ADDRESS,
  PRE_GENESIS_PATH,
  SCHEME,
  UNSAFE_DONT_ENCRYPT,
  WASM_CHECKSUMS_PATH,
} from './catalog.js';
import { addOptions, type Args } from './descriptor.js';
import {
  COMMISSION_RATE_ABOUT,
  MAX_COMMISSION_RATE_CHANGE_ABOUT,
  UNSAFE_DONT_ENCRYPT_KEYS_ABOUT,
  VALIDATOR_SCHEME_ABOUT,
} from './tx.js';
import type { SchemeType, SocketAddress } from './values.js';

export interface JoinNetwork {
  chainId: string;
  genesisValidator?: string;
  preGenesisPath?: string;
  dontPrefetchWasm: boolean;
}

export const joinNetworkArgs: Args<JoinNetwork> = {
  def(cmd) {
    return addOptions(
      cmd,
      CHAIN_ID.def('The chain ID. The chain must be published in the network configuration repository.'),
      GENESIS_VALIDATOR.def('The alias of the genesis validator to set up as, if any.'),
      PRE_GENESIS_PATH.def(
        'The pre-genesis directory of the genesis validator, if any. Defaults to "{base-dir}/pre-genesis/{genesis-validator}".',
      ),
      DONT_PREFETCH_WASM.def('Do not pre-fetch WASM.'),
    );
  },
  parse(matches) {
    return {
      chainId: CHAIN_ID.parse(matches),
      genesisValidator: GENESIS_VALIDATOR.parse(matches),
      preGenesisPath: PRE_GENESIS_PATH.parse(matches),
      dontPrefetchWasm: DONT_PREFETCH_WASM.parse(matches),
    };
  },
};

export interface FetchWasms {
  chainId: string;
}

export const fetchWasmsArgs: Args<FetchWasms> = {
  def(cmd) {
    return addOptions(cmd, CHAIN_ID.def('The chain ID whose pre-built WASM files to download.'));
  },
  parse(matches) {
    return { chainId: CHAIN_ID.parse(matches) };
  },
};

export interface InitNetwork {
  genesisPath: string;
  wasmChecksumsPath: string;
  chainIdPrefix: string;
  unsafeDontEncrypt: boolean;
  /** Milliseconds. */
  consensusTimeoutCommit: number;
  localhost: boolean;
  allowDuplicateIp: boolean;
  dontArchive: boolean;
  archiveDir?: string;
}

export const initNetworkArgs: Args<InitNetwork> = {
  def(cmd) {
    return addOptions(
      cmd,
      GENESIS_PATH.def('Path to the preliminary genesis configuration file.'),
      WASM_CHECKSUMS_PATH.def('Path to the WASM checksums file.'),
      CHAIN_ID_PREFIX.def("The chain ID prefix. Up to 19 alphanumeric, '.', '-' or '_' characters."),
      UNSAFE_DONT_ENCRYPT.def(UNSAFE_DONT_ENCRYPT_KEYS_ABOUT),
      CONSENSUS_TIMEOUT_COMMIT.def('The consensus timeout_commit, e.g. `1s` or `1000ms`.'),
      LOCALHOST.def('Use localhost for the P2P and RPC addresses of the validator ledgers.'),
      ALLOW_DUPLICATE_IP.def("Allow peers connecting from the same IP. Don't use this on mainnet."),
      DONT_ARCHIVE.def('Do NOT create the release archive.'),
      ARCHIVE_DIR.def('Directory in which to store the archive. Defaults to the working directory.'),
    );
  },
  parse(matches) {
    return {
      genesisPath: GENESIS_PATH.parse(matches),
      wasmChecksumsPath: WASM_CHECKSUMS_PATH.parse(matches),
      chainIdPrefix: CHAIN_ID_PREFIX.parse(matches),
      unsafeDontEncrypt: UNSAFE_DONT_ENCRYPT.parse(matches),
      consensusTimeoutCommit: CONSENSUS_TIMEOUT_COMMIT.parse(matches),
      localhost: LOCALHOST.parse(matches),
      allowDuplicateIp: ALLOW_DUPLICATE_IP.parse(matches),
      dontArchive: DONT_ARCHIVE.parse(matches),
      archiveDir: ARCHIVE_DIR.parse(matches),
    };
  },
};

export interface InitGenesisValidator {
  alias: string;
  commissionRate: string;
  maxCommissionRateChange: string;
  netAddress: SocketAddress;
  unsafeDontEncrypt: boolean;
  keyScheme: SchemeType;
}

export const initGenesisValidatorArgs: Args<InitGenesisValidator> = {
  def(cmd) {
    return addOptions(
      cmd,
      ALIAS.def('The validator address alias.'),
      NET_ADDRESS.def("Static {host:port} of the validator node's P2P address. The default P2P port is 26656."),
      COMMISSION_RATE.def(COMMISSION_RATE_ABOUT),
      MAX_COMMISSION_RATE_CHANGE.def(MAX_COMMISSION_RATE_CHANGE_ABOUT),
      UNSAFE_DONT_ENCRYPT.def(UNSAFE_DONT_ENCRYPT_KEYS_ABOUT),
      SCHEME.def(VALIDATOR_SCHEME_ABOUT),
    );
  },
  parse(matches) {
    return {
      alias: ALIAS.parse(matches),
      commissionRate: COMMISSION_RATE.parse(matches),
      maxCommissionRateChange: MAX_COMMISSION_RATE_CHANGE.parse(matches),
      netAddress: NET_ADDRESS.parse(matches),
      unsafeDontEncrypt: UNSAFE_DONT_ENCRYPT.parse(matches),
      keyScheme: SCHEME.parse(matches),
    };
  },
};
