import { resolveOutputFormat } from '../core/config.js';
import type { Context } from '../core/context.js';
import { outputError, outputSuccess } from '../output/formatter.js';

/** Runs an entry point and prints its result, or the error with exit code 1. */
export async function runMain(main: () => Promise<Record<string, unknown>>): Promise<void> {
  const format = resolveOutputFormat(process.env);
  try {
    outputSuccess(await main(), format);
  } catch (err) {
    outputError(err, format);
  }
}

export function describeContext(ctx: Context): Record<string, unknown> {
  return {
    chain_id: ctx.chainId,
    chain_dir: ctx.chainDir,
    wasm_dir: ctx.wasmDir,
    mode: ctx.mode,
  };
}
