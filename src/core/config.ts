import { join } from 'node:path';
import { bech32m } from '@scure/base';
import { z } from 'zod';
import { ADDRESS_PREFIXES, NODE_MODES } from '../args/values.js';
import { ContextError, ErrorCodes } from '../output/errors.js';
import type { OutputFormat } from '../output/formatter.js';
import { ensureSecureDir, fileExists, readJsonFile, writeSecureJson } from './files.js';

export const ENV_BASE_DIR = 'MERIDIAN_BASE_DIR';
export const ENV_WASM_DIR = 'MERIDIAN_WASM_DIR';
export const ENV_OUTPUT = 'MERIDIAN_OUTPUT';

export const DEFAULT_BASE_DIR = '.meridian';
export const DEFAULT_LEDGER_ADDRESS = '127.0.0.1:26657';
export const NATIVE_TOKEN_ALIAS = 'MRD';

export const globalConfigSchema = z.object({
  default_chain_id: z.string().min(1).optional(),
});

export const chainConfigSchema = z.object({
  chain_id: z.string().min(1),
  address_prefix: z.enum(ADDRESS_PREFIXES).default('tmrd'),
  native_token: z.string().optional(),
  wasm_dir: z.string().default('wasm'),
  mode: z.enum(NODE_MODES).default('validator'),
});

export type GlobalConfig = z.infer<typeof globalConfigSchema>;
export type ChainConfig = z.infer<typeof chainConfigSchema>;

export function getGlobalConfigPath(baseDir: string): string {
  return join(baseDir, 'global-config.json');
}

export function getChainDir(baseDir: string, chainId: string): string {
  return join(baseDir, chainId);
}

export function getChainConfigPath(chainDir: string): string {
  return join(chainDir, 'config.json');
}

export function getWalletPath(chainDir: string): string {
  return join(chainDir, 'wallet.json');
}

/** Reads and validates a JSON file; any failure becomes a ContextError naming the file. */
export async function readValidated<S extends z.ZodTypeAny>(filePath: string, schema: S): Promise<z.infer<S>> {
  let raw: unknown;
  try {
    raw = await readJsonFile(filePath);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ContextError(ErrorCodes.ERR_CONTEXT_LOAD, `Cannot read ${filePath}: ${reason}`);
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new ContextError(
      ErrorCodes.ERR_CONTEXT_LOAD,
      `Invalid ${filePath}${where}: ${issue?.message ?? 'schema mismatch'}`,
    );
  }
  return parsed.data;
}

/** Writes a chain file, creating its directory; any failure becomes a ContextError naming the file. */
export async function writeChainFile(chainDir: string, filePath: string, data: unknown): Promise<void> {
  try {
    await ensureSecureDir(chainDir);
    await writeSecureJson(filePath, data);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ContextError(ErrorCodes.ERR_CONTEXT_LOAD, `Cannot write ${filePath}: ${reason}`);
  }
}

export async function loadGlobalConfig(baseDir: string): Promise<GlobalConfig> {
  const configPath = getGlobalConfigPath(baseDir);
  if (!(await fileExists(configPath))) {
    return {};
  }
  return readValidated(configPath, globalConfigSchema);
}

export function defaultChainConfig(chainId: string): ChainConfig {
  return chainConfigSchema.parse({ chain_id: chainId });
}

/** Loads the chain's config, writing the defaults on first use. */
export async function loadChainConfig(chainDir: string, chainId: string): Promise<ChainConfig> {
  const configPath = getChainConfigPath(chainDir);
  if (!(await fileExists(configPath))) {
    const config = defaultChainConfig(chainId);
    await writeChainFile(chainDir, configPath, config);
    return config;
  }
  const config = await readValidated(configPath, chainConfigSchema);
  if (config.chain_id !== chainId) {
    throw new ContextError(
      ErrorCodes.ERR_CONTEXT_LOAD,
      `${configPath} belongs to chain ${config.chain_id}, expected ${chainId}`,
    );
  }
  return config;
}

/** The configured native token, or the all-zero address under the chain's prefix. */
export function nativeTokenAddress(config: ChainConfig): string {
  return config.native_token ?? bech32m.encode(config.address_prefix, bech32m.toWords(new Uint8Array(20)));
}

export function resolveOutputFormat(env: NodeJS.ProcessEnv): OutputFormat {
  return env[ENV_OUTPUT]?.toLowerCase() === 'text' ? 'text' : 'json';
}
