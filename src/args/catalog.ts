import { arg, flag } from './descriptor.js';
import {
  parseAddress,
  parseAmount,
  parseChainId,
  parseChainIdPrefix,
  parseDecimal,
  parseLedgerAddress,
  parseMode,
  parsePath,
  parsePublicKey,
  parseScheme,
  parseSocketAddress,
  parseStorageKey,
  parseText,
  parseTimeout,
  parseU64,
  parseVote,
} from './values.js';
import { WalletAddress, WalletKeypair, WalletPublicKey } from '../core/from-context.js';
import {
  DEFAULT_BASE_DIR,
  DEFAULT_LEDGER_ADDRESS,
  ENV_BASE_DIR,
  ENV_WASM_DIR,
  NATIVE_TOKEN_ALIAS,
} from '../core/config.js';

// Shared argument vocabulary. Commands pick from these; keys are unique per command.

export const ADDRESS = arg('address', WalletAddress.parse);
export const ALIAS = arg('alias', parseText);
export const ALIAS_OPT = ALIAS.opt();
export const ALLOW_DUPLICATE_IP = flag('allow-duplicate-ip');
export const AMOUNT = arg('amount', parseAmount);
export const ARCHIVE_DIR = arg('archive-dir', parsePath).opt();
export const BASE_DIR = arg('base-dir', parsePath).envDefault(ENV_BASE_DIR, DEFAULT_BASE_DIR);
export const BROADCAST_ONLY = flag('broadcast-only');
export const CHAIN_ID = arg('chain-id', parseChainId);
export const CHAIN_ID_OPT = CHAIN_ID.opt();
export const CHAIN_ID_PREFIX = arg('chain-prefix', parseChainIdPrefix);
export const CODE_PATH = arg('code-path', parsePath);
export const CODE_PATH_OPT = CODE_PATH.opt();
export const COMMISSION_RATE = arg('commission-rate', parseDecimal);
export const CONSENSUS_TIMEOUT_COMMIT = arg('consensus-timeout-commit', parseTimeout).default('1s');
export const DATA_PATH = arg('data-path', parsePath);
export const DATA_PATH_OPT = DATA_PATH.opt();
export const DECRYPT = flag('decrypt');
export const DONT_ARCHIVE = flag('dont-archive');
export const DONT_PREFETCH_WASM = flag('dont-prefetch-wasm');
export const DRY_RUN_TX = flag('dry-run');
export const EPOCH = arg('epoch', parseU64).opt();
export const FEE_AMOUNT = arg('fee-amount', parseAmount).default('0');
export const FEE_TOKEN = arg('fee-token', WalletAddress.parse).defaultFromCtx(NATIVE_TOKEN_ALIAS);
export const FORCE = flag('force');
export const GAS_LIMIT = arg('gas-limit', parseAmount).default('0');
export const GENESIS_PATH = arg('genesis-path', parsePath);
export const GENESIS_VALIDATOR = arg('genesis-validator', parseText).opt();
export const LEDGER_ADDRESS_ABOUT =
  'Address of a ledger node as "{scheme}://{host}:{port}". TCP is assumed when the scheme is omitted.';
export const LEDGER_ADDRESS = arg('ledger-address', parseLedgerAddress);
export const LEDGER_ADDRESS_DEFAULT = LEDGER_ADDRESS.default(DEFAULT_LEDGER_ADDRESS);
export const LOCALHOST = flag('localhost');
export const MAX_COMMISSION_RATE_CHANGE = arg('max-commission-rate-change', parseDecimal);
export const MODE = arg('mode', parseMode).opt();
export const NET_ADDRESS = arg('net-address', parseSocketAddress);
export const OWNER = arg('owner', WalletAddress.parse).opt();
export const PRE_GENESIS_PATH = arg('pre-genesis-path', parsePath).opt();
export const PROPOSAL_ID = arg('proposal-id', parseU64);
export const PROPOSAL_ID_OPT = PROPOSAL_ID.opt();
export const PROPOSAL_OFFLINE = flag('offline');
export const PROPOSAL_VOTE = arg('vote', parseVote);
export const PROTOCOL_KEY = arg('protocol-key', WalletPublicKey.parse).opt();
export const PUBLIC_KEY = arg('public-key', WalletPublicKey.parse);
export const RAW_ADDRESS = arg('address', parseAddress);
export const RAW_ADDRESS_OPT = RAW_ADDRESS.opt();
export const RAW_PUBLIC_KEY_OPT = arg('public-key', parsePublicKey).opt();
export const SCHEME = arg('scheme', parseScheme).default('ed25519');
export const SIGNER = arg('signer', WalletAddress.parse).opt();
export const SIGNING_KEY = arg('signing-key', WalletKeypair.parse);
export const SIGNING_KEY_OPT = SIGNING_KEY.opt();
export const SOURCE = arg('source', WalletAddress.parse);
export const SOURCE_OPT = SOURCE.opt();
export const STORAGE_KEY = arg('storage-key', parseStorageKey);
export const SUB_PREFIX = arg('sub-prefix', parseText).opt();
export const TARGET = arg('target', WalletAddress.parse);
export const TOKEN = arg('token', WalletAddress.parse);
export const TOKEN_OPT = TOKEN.opt();
export const TX_HASH = arg('tx-hash', parseText);
export const UNSAFE_DONT_ENCRYPT = flag('unsafe-dont-encrypt');
export const UNSAFE_SHOW_SECRET = flag('unsafe-show-secret');
export const VALIDATOR = arg('validator', WalletAddress.parse);
export const VALIDATOR_OPT = VALIDATOR.opt();
export const VALIDATOR_ACCOUNT_KEY = arg('account-key', WalletPublicKey.parse).opt();
export const VALIDATOR_CONSENSUS_KEY = arg('consensus-key', WalletKeypair.parse).opt();
export const VALIDATOR_CODE_PATH = arg('validator-code-path', parsePath).opt();
export const VALUE = arg('value', parseText).opt();
export const WASM_CHECKSUMS_PATH = arg('wasm-checksums-path', parsePath);
export const WASM_DIR = arg('wasm-dir', parsePath).envOpt(ENV_WASM_DIR);
