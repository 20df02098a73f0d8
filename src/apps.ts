import type { GlobalArgs } from './args/global.js';
import type { App } from './cli/app.js';
import { cmdSet, mapSub, subCmd } from './cli/command.js';
import { parseCommand, processIo, type CliIo } from './cli/dispatch.js';
import {
  clientCommands,
  txCustom,
  txInitProposal,
  txTransfer,
  txUpdateVp,
  txVoteProposal,
  type ClientCommand,
  type ClientContextCommand,
  type TxCustomCommand,
  type TxInitProposalCommand,
  type TxTransferCommand,
  type TxUpdateVpCommand,
  type TxVoteProposalCommand,
} from './commands/client.js';
import { ledger, nodeCommands, type LedgerCommand, type NodeCommand } from './commands/node.js';
import type { UtilsCommand } from './commands/utils.js';
import { walletCommands, type WalletCommand } from './commands/wallet.js';
import { loadContext as loadContextFromDisk, type Context, type ContextLoader } from './core/context.js';
import { VERSION } from './version.js';

export type CombinedCommand =
  | { type: 'node'; command: NodeCommand }
  | { type: 'client'; command: ClientCommand }
  | { type: 'wallet'; command: WalletCommand }
  | { type: 'ledger'; command: LedgerCommand }
  | TxCustomCommand
  | TxTransferCommand
  | TxUpdateVpCommand
  | TxInitProposalCommand
  | TxVoteProposalCommand;

export const combinedApp: App<CombinedCommand> = {
  name: 'meridian',
  about: 'Meridian command line interface.',
  version: VERSION,
  commands: cmdSet<CombinedCommand>([
    mapSub(subCmd('node', 'Node sub-commands.', nodeCommands), (command) => ({ type: 'node' as const, command })),
    mapSub(subCmd('client', 'Client sub-commands.', clientCommands), (command) => ({
      type: 'client' as const,
      command,
    })),
    mapSub(subCmd('wallet', 'Wallet sub-commands.', walletCommands), (command) => ({
      type: 'wallet' as const,
      command,
    })),
    // inlined from the node and the client
    mapSub(ledger, (command) => ({ type: 'ledger' as const, command })),
    txCustom,
    txTransfer,
    txUpdateVp,
    txInitProposal,
    txVoteProposal,
  ]),
};

export const nodeApp: App<NodeCommand> = {
  name: 'meridian-node',
  about: 'Meridian node command line interface.',
  version: VERSION,
  commands: nodeCommands,
};

export const clientApp: App<ClientCommand> = {
  name: 'meridian-client',
  about: 'Meridian client command line interface.',
  version: VERSION,
  commands: clientCommands,
};

export const walletApp: App<WalletCommand> = {
  name: 'meridian-wallet',
  about: 'Meridian wallet command line interface.',
  version: VERSION,
  commands: walletCommands,
};

export interface CliOptions {
  /** User arguments, without the executable. Defaults to `process.argv.slice(2)`. */
  argv?: readonly string[];
  io?: CliIo;
  loadContext?: ContextLoader;
}

function resolveOptions(options: CliOptions): Required<CliOptions> {
  return {
    argv: options.argv ?? process.argv.slice(2),
    io: options.io ?? processIo(),
    loadContext: options.loadContext ?? loadContextFromDisk,
  };
}

export interface CombinedInvocation {
  command: CombinedCommand;
  token: string;
}

/** The combined executable forwards to the others, so it never loads a context itself. */
export function combinedCli(options: CliOptions = {}): CombinedInvocation {
  const { argv, io } = resolveOptions(options);
  const { command, token } = parseCommand(combinedApp, argv, io);
  return { command, token };
}

export interface ContextInvocation<T> {
  command: T;
  token: string;
  ctx: Context;
}

export async function nodeCli(options: CliOptions = {}): Promise<ContextInvocation<NodeCommand>> {
  const { argv, io, loadContext } = resolveOptions(options);
  const { command, token, global } = parseCommand(nodeApp, argv, io);
  return { command, token, ctx: await loadContext(global) };
}

export async function walletCli(options: CliOptions = {}): Promise<ContextInvocation<WalletCommand>> {
  const { argv, io, loadContext } = resolveOptions(options);
  const { command, token, global } = parseCommand(walletApp, argv, io);
  return { command, token, ctx: await loadContext(global) };
}

export type ClientInvocation =
  | { context: 'with'; command: ClientContextCommand; token: string; ctx: Context }
  | { context: 'without'; command: UtilsCommand; token: string; global: GlobalArgs };

/** Loads the context only for commands that need it; utilities get the global arguments. */
export async function clientCli(options: CliOptions = {}): Promise<ClientInvocation> {
  const { argv, io, loadContext } = resolveOptions(options);
  const { command, token, global } = parseCommand(clientApp, argv, io);
  if (command.context === 'with') {
    return { context: 'with', command: command.command, token, ctx: await loadContext(global) };
  }
  return { context: 'without', command: command.command, token, global };
}
