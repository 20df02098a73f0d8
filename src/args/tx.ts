import type { Command } from 'commander';
import type { WalletAddress, WalletKeypair, WalletPublicKey } from '../core/from-context.js';
import {
  ADDRESS,
  ALIAS_OPT,
  AMOUNT,
  BROADCAST_ONLY,
  CODE_PATH,
  CODE_PATH_OPT,
  COMMISSION_RATE,
  DATA_PATH,
  DATA_PATH_OPT,
  DRY_RUN_TX,
  FEE_AMOUNT,
  FEE_TOKEN,
  FORCE,
  GAS_LIMIT,
  LEDGER_ADDRESS_ABOUT,
  LEDGER_ADDRESS_DEFAULT,
  MAX_COMMISSION_RATE_CHANGE,
  PROPOSAL_ID_OPT,
  PROPOSAL_OFFLINE,
  PROPOSAL_VOTE,
  PROTOCOL_KEY,
  PUBLIC_KEY,
  SCHEME,
  SIGNER,
  SIGNING_KEY_OPT,
  SOURCE,
  SOURCE_OPT,
  SUB_PREFIX,
  TARGET,
  TOKEN,
  UNSAFE_DONT_ENCRYPT,
  VALIDATOR,
  VALIDATOR_ACCOUNT_KEY,
  VALIDATOR_CODE_PATH,
  VALIDATOR_CONSENSUS_KEY,
} from './catalog.js';
import { addOptions, type Args } from './descriptor.js';
import type { LedgerAddress, ProposalVote, SchemeType } from './values.js';

/** Arguments shared by every transaction. */
export interface Tx {
  dryRun: boolean;
  force: boolean;
  broadcastOnly: boolean;
  ledgerAddress: LedgerAddress;
  /** Alias for any account the transaction initializes. */
  initializedAccountAlias?: string;
  feeAmount: bigint;
  feeToken: WalletAddress;
  gasLimit: bigint;
  signingKey?: WalletKeypair;
  signer?: WalletAddress;
}

export const txArgs: Args<Tx> = {
  def(cmd: Command): Command {
    return addOptions(
      cmd,
      DRY_RUN_TX.def('Simulate the transaction application.'),
      FORCE.def("Submit the transaction even if it doesn't pass client checks."),
      BROADCAST_ONLY.def('Return once the transaction is in the mempool instead of waiting for it to be applied.'),
      LEDGER_ADDRESS_DEFAULT.def(LEDGER_ADDRESS_ABOUT),
      ALIAS_OPT.def(
        'Alias under which to save any account the transaction initializes. ' +
          'With several new accounts, each alias gets a numeric suffix.',
      ),
      FEE_AMOUNT.def('The amount paid for the inclusion of this transaction.'),
      FEE_TOKEN.def('The token for paying the fee.'),
      GAS_LIMIT.def('The maximum amount of gas needed to run the transaction.'),
      SIGNING_KEY_OPT.def('Sign with the key for the given public key or alias from the wallet.').conflicts(
        SIGNER.attributeName,
      ),
      SIGNER.def('Sign with the keypair of the public key of the given address.').conflicts(
        SIGNING_KEY_OPT.attributeName,
      ),
    );
  },
  parse(matches) {
    return {
      dryRun: DRY_RUN_TX.parse(matches),
      force: FORCE.parse(matches),
      broadcastOnly: BROADCAST_ONLY.parse(matches),
      ledgerAddress: LEDGER_ADDRESS_DEFAULT.parse(matches),
      initializedAccountAlias: ALIAS_OPT.parse(matches),
      feeAmount: FEE_AMOUNT.parse(matches),
      feeToken: FEE_TOKEN.parse(matches),
      gasLimit: GAS_LIMIT.parse(matches),
      signingKey: SIGNING_KEY_OPT.parse(matches),
      signer: SIGNER.parse(matches),
    };
  },
};

export interface TxCustom {
  tx: Tx;
  codePath: string;
  dataPath?: string;
}

export const txCustomArgs: Args<TxCustom> = {
  def(cmd) {
    return addOptions(
      txArgs.def(cmd),
      CODE_PATH.def("The path to the transaction's WASM code."),
      DATA_PATH_OPT.def('A file whose bytes are passed to the transaction code when it is executed.'),
    );
  },
  parse(matches) {
    return {
      tx: txArgs.parse(matches),
      codePath: CODE_PATH.parse(matches),
      dataPath: DATA_PATH_OPT.parse(matches),
    };
  },
};

export interface TxTransfer {
  tx: Tx;
  source: WalletAddress;
  target: WalletAddress;
  token: WalletAddress;
  subPrefix?: string;
  /** Micro-units. */
  amount: bigint;
}

export const txTransferArgs: Args<TxTransfer> = {
  def(cmd) {
    return addOptions(
      txArgs.def(cmd),
      SOURCE.def("The source account address. The source's key signs the transfer."),
      TARGET.def('The target account address.'),
      TOKEN.def('The transfer token.'),
      SUB_PREFIX.def("The token's sub prefix."),
      AMOUNT.def('The amount to transfer in decimal.'),
    );
  },
  parse(matches) {
    return {
      tx: txArgs.parse(matches),
      source: SOURCE.parse(matches),
      target: TARGET.parse(matches),
      token: TOKEN.parse(matches),
      subPrefix: SUB_PREFIX.parse(matches),
      amount: AMOUNT.parse(matches),
    };
  },
};

export interface TxUpdateVp {
  tx: Tx;
  vpCodePath: string;
  address: WalletAddress;
}

export const txUpdateVpArgs: Args<TxUpdateVp> = {
  def(cmd) {
    return addOptions(
      txArgs.def(cmd),
      CODE_PATH.def('The path to the new validity predicate WASM code.'),
      ADDRESS.def("The account's address. Its key signs the transaction."),
    );
  },
  parse(matches) {
    return {
      tx: txArgs.parse(matches),
      vpCodePath: CODE_PATH.parse(matches),
      address: ADDRESS.parse(matches),
    };
  },
};

export interface TxInitAccount {
  tx: Tx;
  source: WalletAddress;
  vpCodePath?: string;
  publicKey: WalletPublicKey;
}

export const txInitAccountArgs: Args<TxInitAccount> = {
  def(cmd) {
    return addOptions(
      txArgs.def(cmd),
      SOURCE.def("The source account's address that signs the transaction."),
      CODE_PATH_OPT.def('Validity predicate WASM code for the new account. The default user VP is used if omitted.'),
      PUBLIC_KEY.def('Hex encoded public key for the new account.'),
    );
  },
  parse(matches) {
    return {
      tx: txArgs.parse(matches),
      source: SOURCE.parse(matches),
      vpCodePath: CODE_PATH_OPT.parse(matches),
      publicKey: PUBLIC_KEY.parse(matches),
    };
  },
};

export interface TxInitValidator {
  tx: Tx;
  source: WalletAddress;
  scheme: SchemeType;
  accountKey?: WalletPublicKey;
  consensusKey?: WalletKeypair;
  protocolKey?: WalletPublicKey;
  commissionRate: string;
  maxCommissionRateChange: string;
  validatorVpCodePath?: string;
  unsafeDontEncrypt: boolean;
}

export const COMMISSION_RATE_ABOUT = 'The commission rate charged by the validator for delegation rewards.';
export const MAX_COMMISSION_RATE_CHANGE_ABOUT =
  'The maximum change per epoch in the commission rate charged by the validator for delegation rewards.';
export const VALIDATOR_SCHEME_ABOUT = 'The key scheme used for the validator keys: ed25519 or secp256k1.';
export const UNSAFE_DONT_ENCRYPT_KEYS_ABOUT =
  'UNSAFE: Do not encrypt the generated keypairs. Do not use this for keys used in a live network.';

export const txInitValidatorArgs: Args<TxInitValidator> = {
  def(cmd) {
    return addOptions(
      txArgs.def(cmd),
      SOURCE.def("The source account's address that signs the transaction."),
      SCHEME.def(VALIDATOR_SCHEME_ABOUT),
      VALIDATOR_ACCOUNT_KEY.def('A public key for the validator account. Generated if omitted.'),
      VALIDATOR_CONSENSUS_KEY.def('A consensus key for the validator account. Generated if omitted.'),
      PROTOCOL_KEY.def('A public key for signing protocol transactions. Generated if omitted.'),
      COMMISSION_RATE.def(COMMISSION_RATE_ABOUT),
      MAX_COMMISSION_RATE_CHANGE.def(MAX_COMMISSION_RATE_CHANGE_ABOUT),
      VALIDATOR_CODE_PATH.def(
        'Validity predicate WASM code for the validator account. The default validator VP is used if omitted.',
      ),
      UNSAFE_DONT_ENCRYPT.def(UNSAFE_DONT_ENCRYPT_KEYS_ABOUT),
    );
  },
  parse(matches) {
    return {
      tx: txArgs.parse(matches),
      source: SOURCE.parse(matches),
      scheme: SCHEME.parse(matches),
      accountKey: VALIDATOR_ACCOUNT_KEY.parse(matches),
      consensusKey: VALIDATOR_CONSENSUS_KEY.parse(matches),
      protocolKey: PROTOCOL_KEY.parse(matches),
      commissionRate: COMMISSION_RATE.parse(matches),
      maxCommissionRateChange: MAX_COMMISSION_RATE_CHANGE.parse(matches),
      validatorVpCodePath: VALIDATOR_CODE_PATH.parse(matches),
      unsafeDontEncrypt: UNSAFE_DONT_ENCRYPT.parse(matches),
    };
  },
};

export interface Bond {
  tx: Tx;
  validator: WalletAddress;
  amount: bigint;
  /** Delegator. Omitted for self-bonds. */
  source?: WalletAddress;
}

export const bondArgs: Args<Bond> = {
  def(cmd) {
    return addOptions(
      txArgs.def(cmd),
      VALIDATOR.def('Validator address.'),
      AMOUNT.def('Amount of tokens to stake in a bond.'),
      SOURCE_OPT.def('Source address for delegations. For self-bonds, the validator is also the source.'),
    );
  },
  parse(matches) {
    return {
      tx: txArgs.parse(matches),
      validator: VALIDATOR.parse(matches),
      amount: AMOUNT.parse(matches),
      source: SOURCE_OPT.parse(matches),
    };
  },
};

export type Unbond = Bond;

export const unbondArgs: Args<Unbond> = {
  def(cmd) {
    return addOptions(
      txArgs.def(cmd),
      VALIDATOR.def('Validator address.'),
      AMOUNT.def('Amount of tokens to unbond from a bond.'),
      SOURCE_OPT.def(
        'Source address for unbonding from delegations. For self-bonds, the validator is also the source.',
      ),
    );
  },
  parse: bondArgs.parse,
};

export interface Withdraw {
  tx: Tx;
  validator: WalletAddress;
  source?: WalletAddress;
}

export const withdrawArgs: Args<Withdraw> = {
  def(cmd) {
    return addOptions(
      txArgs.def(cmd),
      VALIDATOR.def('Validator address.'),
      SOURCE_OPT.def(
        'Source address for withdrawing from delegations. For self-bonds, the validator is also the source.',
      ),
    );
  },
  parse(matches) {
    return {
      tx: txArgs.parse(matches),
      validator: VALIDATOR.parse(matches),
      source: SOURCE_OPT.parse(matches),
    };
  },
};

export interface InitProposal {
  tx: Tx;
  proposalData: string;
  offline: boolean;
}

const PROPOSAL_DATA_ABOUT = 'The JSON file that describes the proposal.';

export const initProposalArgs: Args<InitProposal> = {
  def(cmd) {
    return addOptions(
      txArgs.def(cmd),
      DATA_PATH.def(PROPOSAL_DATA_ABOUT),
      PROPOSAL_OFFLINE.def('Create the proposal offline.'),
    );
  },
  parse(matches) {
    return {
      tx: txArgs.parse(matches),
      proposalData: DATA_PATH.parse(matches),
      offline: PROPOSAL_OFFLINE.parse(matches),
    };
  },
};

export interface VoteProposal {
  tx: Tx;
  proposalId?: bigint;
  vote: ProposalVote;
  offline: boolean;
  proposalData?: string;
}

export const voteProposalArgs: Args<VoteProposal> = {
  def(cmd) {
    return addOptions(
      txArgs.def(cmd),
      PROPOSAL_ID_OPT.def('The proposal identifier.').conflicts([
        PROPOSAL_OFFLINE.attributeName,
        DATA_PATH_OPT.attributeName,
      ]),
      PROPOSAL_VOTE.def('The vote for the proposal: yay or nay.'),
      PROPOSAL_OFFLINE.def('Vote offline.'),
      DATA_PATH_OPT.def(PROPOSAL_DATA_ABOUT),
    );
  },
  parse(matches) {
    return {
      tx: txArgs.parse(matches),
      proposalId: PROPOSAL_ID_OPT.parse(matches),
      vote: PROPOSAL_VOTE.parse(matches),
      offline: PROPOSAL_OFFLINE.parse(matches),
      proposalData: DATA_PATH_OPT.parse(matches),
    };
  },
};
