import {
  queryArgs,
  queryBalanceArgs,
  queryBondsArgs,
  queryCommissionRateArgs,
  queryProposalArgs,
  queryProposalResultArgs,
  queryProtocolParametersArgs,
  queryRawBytesArgs,
  queryResultArgs,
  querySlashesArgs,
  queryVotingPowerArgs,
} from '../args/query.js';
import {
  bondArgs,
  initProposalArgs,
  txCustomArgs,
  txInitAccountArgs,
  txInitValidatorArgs,
  txTransferArgs,
  txUpdateVpArgs,
  unbondArgs,
  voteProposalArgs,
  withdrawArgs,
} from '../args/tx.js';
import { cmdSet, leaf, withContext, withoutContext, type Parsed, type WithContext, type WithoutContext } from '../cli/command.js';
import { utils, type UtilsCommand } from './utils.js';

// Transactions
export const txCustom = leaf('tx', 'Send a transaction with custom WASM code.', 'tx-custom', txCustomArgs);
export const txTransfer = leaf('transfer', 'Send a signed transfer transaction.', 'tx-transfer', txTransferArgs);
export const txUpdateVp = leaf(
  'update',
  "Send a signed transaction to update an account's validity predicate.",
  'tx-update-vp',
  txUpdateVpArgs,
);
export const txInitAccount = leaf(
  'init-account',
  'Send a signed transaction to create a new established account.',
  'tx-init-account',
  txInitAccountArgs,
);
export const txInitValidator = leaf(
  'init-validator',
  'Send a signed transaction to create a new validator account.',
  'tx-init-validator',
  txInitValidatorArgs,
);
export const txInitProposal = leaf('init-proposal', 'Create a new proposal.', 'tx-init-proposal', initProposalArgs);
export const txVoteProposal = leaf('vote-proposal', 'Vote on a proposal.', 'tx-vote-proposal', voteProposalArgs);

// Proof of stake
export const bond = leaf('bond', 'Bond tokens in the PoS system.', 'bond', bondArgs);
export const unbond = leaf('unbond', 'Unbond tokens from a PoS bond.', 'unbond', unbondArgs);
export const withdraw = leaf('withdraw', 'Withdraw tokens from a previously unbonded PoS bond.', 'withdraw', withdrawArgs);

// Queries
export const queryEpoch = leaf('epoch', 'Query the epoch of the last committed block.', 'query-epoch', queryArgs);
export const queryBlock = leaf('block', 'Query the last committed block.', 'query-block', queryArgs);
export const queryBalance = leaf('balance', 'Query balance(s) of tokens.', 'query-balance', queryBalanceArgs);
export const queryBonds = leaf('bonds', 'Query PoS bond(s).', 'query-bonds', queryBondsArgs);
export const queryVotingPower = leaf('voting-power', 'Query PoS voting power.', 'query-voting-power', queryVotingPowerArgs);
export const queryCommissionRate = leaf(
  'commission-rate',
  'Query a validator commission rate.',
  'query-commission-rate',
  queryCommissionRateArgs,
);
export const querySlashes = leaf('slashes', 'Query PoS applied slashes.', 'query-slashes', querySlashesArgs);
export const queryResult = leaf('tx-result', 'Query the result of a transaction.', 'query-result', queryResultArgs);
export const queryRawBytes = leaf(
  'query-bytes',
  'Query the raw bytes of a given storage key.',
  'query-raw-bytes',
  queryRawBytesArgs,
);
export const queryProposal = leaf('query-proposal', 'Query proposals.', 'query-proposal', queryProposalArgs);
export const queryProposalResult = leaf(
  'query-proposal-result',
  'Query the result of proposals.',
  'query-proposal-result',
  queryProposalResultArgs,
);
export const queryProtocolParameters = leaf(
  'query-protocol-parameters',
  'Query protocol parameters.',
  'query-protocol-parameters',
  queryProtocolParametersArgs,
);

export type TxCustomCommand = Parsed<typeof txCustom>;
export type TxTransferCommand = Parsed<typeof txTransfer>;
export type TxUpdateVpCommand = Parsed<typeof txUpdateVp>;
export type TxInitProposalCommand = Parsed<typeof txInitProposal>;
export type TxVoteProposalCommand = Parsed<typeof txVoteProposal>;

/** Client commands that need the chain context loaded before they run. */
export type ClientContextCommand =
  | TxCustomCommand
  | TxTransferCommand
  | TxUpdateVpCommand
  | Parsed<typeof txInitAccount>
  | Parsed<typeof txInitValidator>
  | TxInitProposalCommand
  | TxVoteProposalCommand
  | Parsed<typeof bond>
  | Parsed<typeof unbond>
  | Parsed<typeof withdraw>
  | Parsed<typeof queryEpoch>
  | Parsed<typeof queryBlock>
  | Parsed<typeof queryBalance>
  | Parsed<typeof queryBonds>
  | Parsed<typeof queryVotingPower>
  | Parsed<typeof queryCommissionRate>
  | Parsed<typeof querySlashes>
  | Parsed<typeof queryResult>
  | Parsed<typeof queryRawBytes>
  | Parsed<typeof queryProposal>
  | Parsed<typeof queryProposalResult>
  | Parsed<typeof queryProtocolParameters>;

export type ClientCommand = WithContext<ClientContextCommand> | WithoutContext<UtilsCommand>;

/** In display order: transactions, proof of stake, queries, then utilities. */
export const clientCommands = cmdSet<ClientCommand>([
  withContext(txCustom),
  withContext(txTransfer),
  withContext(txUpdateVp),
  withContext(txInitAccount),
  withContext(txInitValidator),
  withContext(txInitProposal),
  withContext(txVoteProposal),
  withContext(bond),
  withContext(unbond),
  withContext(withdraw),
  withContext(queryEpoch),
  withContext(queryBlock),
  withContext(queryBalance),
  withContext(queryBonds),
  withContext(queryVotingPower),
  withContext(queryCommissionRate),
  withContext(querySlashes),
  withContext(queryResult),
  withContext(queryRawBytes),
  withContext(queryProposal),
  withContext(queryProposalResult),
  withContext(queryProtocolParameters),
  withoutContext(utils),
]);
