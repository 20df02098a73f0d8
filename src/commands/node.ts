import { bare, cmdSet, subCmd, type Parsed } from '../cli/command.js';

export const ledgerRun = bare('run', 'Run the ledger node.', 'ledger-run');
export const ledgerReset = bare(
  'reset',
  'Delete the ledger node state and start the node from scratch.',
  'ledger-reset',
);

export type LedgerCommand = Parsed<typeof ledgerRun> | Parsed<typeof ledgerReset>;

export const ledger = subCmd(
  'ledger',
  'Ledger node sub-commands. Runs the node when none is given.',
  cmdSet<LedgerCommand>([ledgerRun, ledgerReset], { defaultChild: 'run' }),
);

export const configGen = bare('gen', 'Generate the default configuration file.', 'config-gen');

export type ConfigCommand = Parsed<typeof configGen>;

export const config = subCmd('config', 'Configuration sub-commands.', cmdSet<ConfigCommand>([configGen]));

export type NodeCommand = LedgerCommand | ConfigCommand;

export const nodeCommands = cmdSet<NodeCommand>([ledger, config]);
