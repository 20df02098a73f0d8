import { join, resolve } from 'node:path';
import type { GlobalArgs } from '../args/global.js';
import type { NodeMode } from '../args/values.js';
import { ContextError, ErrorCodes } from '../output/errors.js';
import { getChainDir, loadChainConfig, loadGlobalConfig, type ChainConfig } from './config.js';
import type { FromContext } from './from-context.js';
import { Wallet } from './wallet.js';

/**
 * Everything a command needs beyond its own arguments: the chain's
 * configuration and wallet, located from the global arguments.
 */
export class Context {
  constructor(
    readonly global: GlobalArgs,
    readonly chainId: string,
    readonly chainDir: string,
    readonly config: ChainConfig,
    readonly wallet: Wallet,
    readonly wasmDir: string,
    readonly mode: NodeMode,
  ) {}

  /** Resolves a wallet reference taken from the command line. */
  get<T>(value: FromContext<T>): T {
    return value.resolve(this.wallet);
  }

  getOpt<T>(value: FromContext<T> | undefined): T | undefined {
    return value === undefined ? undefined : this.get(value);
  }
}

export type ContextLoader = (global: GlobalArgs) => Promise<Context>;

export const loadContext: ContextLoader = async (global) => {
  const baseDir = resolve(global.baseDir);
  const globalConfig = await loadGlobalConfig(baseDir);
  const chainId = global.chainId ?? globalConfig.default_chain_id;
  if (chainId === undefined) {
    throw new ContextError(
      ErrorCodes.ERR_NO_CHAIN_ID,
      `No chain ID given and no default chain configured in ${baseDir}. Pass --chain-id or join a network first.`,
    );
  }
  const chainDir = getChainDir(baseDir, chainId);
  const config = await loadChainConfig(chainDir, chainId);
  const wallet = await Wallet.load(chainDir, config);
  return new Context(
    global,
    chainId,
    chainDir,
    config,
    wallet,
    global.wasmDir ?? join(chainDir, config.wasm_dir),
    global.mode ?? config.mode,
  );
};
