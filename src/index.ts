export { ArgMatches, type MatchValue } from './args/matches.js';
export {
  Arg,
  ArgDefault,
  ArgFlag,
  ArgOpt,
  addGroup,
  addOptions,
  arg,
  flag,
  type ArgGroup,
  type Args,
  type Cardinality,
  type DefaultSource,
} from './args/descriptor.js';
export * as catalog from './args/catalog.js';
export * from './args/values.js';
export { globalArgs, type GlobalArgs } from './args/global.js';
export * from './args/tx.js';
export * from './args/query.js';
export * from './args/wallet.js';
export * from './args/utils.js';
export * from './cli/command.js';
export { buildApp, type App } from './cli/app.js';
export { EXIT_USAGE, parseCommand, processIo, type CliIo, type ParsedInvocation } from './cli/dispatch.js';
export * from './apps.js';
export type { ClientCommand, ClientContextCommand } from './commands/client.js';
export type { LedgerCommand, NodeCommand } from './commands/node.js';
export type { UtilsCommand } from './commands/utils.js';
export type { WalletCommand } from './commands/wallet.js';
export { Context, loadContext, type ContextLoader } from './core/context.js';
export { WalletAddress, WalletKeypair, WalletPublicKey, type FromContext } from './core/from-context.js';
export { Wallet, type StoredKey } from './core/wallet.js';
export * from './output/errors.js';
export { VERSION } from './version.js';
