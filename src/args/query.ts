import type { WalletAddress } from '../core/from-context.js';
import {
  DATA_PATH_OPT,
  EPOCH,
  LEDGER_ADDRESS_ABOUT,
  LEDGER_ADDRESS_DEFAULT,
  OWNER,
  PROPOSAL_ID_OPT,
  PROPOSAL_OFFLINE,
  STORAGE_KEY,
  SUB_PREFIX,
  TOKEN_OPT,
  TX_HASH,
  VALIDATOR_OPT,
} from './catalog.js';
import { addOptions, type Args } from './descriptor.js';
import type { LedgerAddress, StorageKey } from './values.js';

/** Arguments shared by every query. */
export interface Query {
  ledgerAddress: LedgerAddress;
}

export const queryArgs: Args<Query> = {
  def(cmd) {
    return addOptions(cmd, LEDGER_ADDRESS_DEFAULT.def(LEDGER_ADDRESS_ABOUT));
  },
  parse(matches) {
    return { ledgerAddress: LEDGER_ADDRESS_DEFAULT.parse(matches) };
  },
};

export interface QueryResult {
  query: Query;
  txHash: string;
}

export const queryResultArgs: Args<QueryResult> = {
  def(cmd) {
    return addOptions(queryArgs.def(cmd), TX_HASH.def('The hash of the transaction being looked up.'));
  },
  parse(matches) {
    return { query: queryArgs.parse(matches), txHash: TX_HASH.parse(matches) };
  },
};

export interface QueryBalance {
  query: Query;
  owner?: WalletAddress;
  token?: WalletAddress;
  subPrefix?: string;
}

export const queryBalanceArgs: Args<QueryBalance> = {
  def(cmd) {
    return addOptions(
      queryArgs.def(cmd),
      OWNER.def('The account address whose balance to query.'),
      TOKEN_OPT.def("The token's address whose balance to query."),
      SUB_PREFIX.def("The token's sub prefix whose balance to query."),
    );
  },
  parse(matches) {
    return {
      query: queryArgs.parse(matches),
      owner: OWNER.parse(matches),
      token: TOKEN_OPT.parse(matches),
      subPrefix: SUB_PREFIX.parse(matches),
    };
  },
};

export interface QueryBonds {
  query: Query;
  owner?: WalletAddress;
  validator?: WalletAddress;
}

export const queryBondsArgs: Args<QueryBonds> = {
  def(cmd) {
    return addOptions(
      queryArgs.def(cmd),
      OWNER.def('The owner account address whose bonds to query.'),
      VALIDATOR_OPT.def("The validator's address whose bonds to query."),
    );
  },
  parse(matches) {
    return {
      query: queryArgs.parse(matches),
      owner: OWNER.parse(matches),
      validator: VALIDATOR_OPT.parse(matches),
    };
  },
};

/** Validator-at-epoch lookups share one shape. */
export interface QueryValidatorAtEpoch {
  query: Query;
  validator?: WalletAddress;
  epoch?: bigint;
}

export type QueryVotingPower = QueryValidatorAtEpoch;
export type QueryCommissionRate = QueryValidatorAtEpoch;

function validatorAtEpochArgs(subject: string): Args<QueryValidatorAtEpoch> {
  return {
    def(cmd) {
      return addOptions(
        queryArgs.def(cmd),
        VALIDATOR_OPT.def(`The validator's address whose ${subject} to query.`),
        EPOCH.def('The epoch at which to query (last committed, if not specified).'),
      );
    },
    parse(matches) {
      return {
        query: queryArgs.parse(matches),
        validator: VALIDATOR_OPT.parse(matches),
        epoch: EPOCH.parse(matches),
      };
    },
  };
}

export const queryVotingPowerArgs: Args<QueryVotingPower> = validatorAtEpochArgs('voting power');
export const queryCommissionRateArgs: Args<QueryCommissionRate> = validatorAtEpochArgs('commission rate');

export interface QuerySlashes {
  query: Query;
  validator?: WalletAddress;
}

export const querySlashesArgs: Args<QuerySlashes> = {
  def(cmd) {
    return addOptions(queryArgs.def(cmd), VALIDATOR_OPT.def("The validator's address whose slashes to query."));
  },
  parse(matches) {
    return { query: queryArgs.parse(matches), validator: VALIDATOR_OPT.parse(matches) };
  },
};

export interface QueryRawBytes {
  query: Query;
  storageKey: StorageKey;
}

export const queryRawBytesArgs: Args<QueryRawBytes> = {
  def(cmd) {
    return addOptions(queryArgs.def(cmd), STORAGE_KEY.def('Storage key'));
  },
  parse(matches) {
    return { query: queryArgs.parse(matches), storageKey: STORAGE_KEY.parse(matches) };
  },
};

export interface QueryProposal {
  query: Query;
  proposalId?: bigint;
}

export const queryProposalArgs: Args<QueryProposal> = {
  def(cmd) {
    return addOptions(queryArgs.def(cmd), PROPOSAL_ID_OPT.def('The proposal identifier.'));
  },
  parse(matches) {
    return { query: queryArgs.parse(matches), proposalId: PROPOSAL_ID_OPT.parse(matches) };
  },
};

export interface QueryProposalResult {
  query: Query;
  proposalId?: bigint;
  offline: boolean;
  /** Folder holding the proposal JSON and its votes. */
  proposalFolder?: string;
}

export const queryProposalResultArgs: Args<QueryProposalResult> = {
  def(cmd) {
    return addOptions(
      queryArgs.def(cmd),
      PROPOSAL_ID_OPT.def('The proposal identifier.').conflicts([
        PROPOSAL_OFFLINE.attributeName,
        DATA_PATH_OPT.attributeName,
      ]),
      PROPOSAL_OFFLINE.def('Compute the result from offline data.'),
      DATA_PATH_OPT.def('The folder containing the proposal JSON and votes.'),
    );
  },
  parse(matches) {
    return {
      query: queryArgs.parse(matches),
      proposalId: PROPOSAL_ID_OPT.parse(matches),
      offline: PROPOSAL_OFFLINE.parse(matches),
      proposalFolder: DATA_PATH_OPT.parse(matches),
    };
  },
};

export interface QueryProtocolParameters {
  query: Query;
}

export const queryProtocolParametersArgs: Args<QueryProtocolParameters> = {
  def: queryArgs.def,
  parse(matches) {
    return { query: queryArgs.parse(matches) };
  },
};
