import type { Command, Option } from 'commander';
import { BASE_DIR, CHAIN_ID_OPT, MODE, WASM_DIR } from './catalog.js';
import type { ArgMatches } from './matches.js';
import type { NodeMode } from './values.js';

/** Arguments accepted at every level of every executable. */
export interface GlobalArgs {
  chainId?: string;
  baseDir: string;
  wasmDir?: string;
  mode?: NodeMode;
}

function globalOptions(): Option[] {
  return [
    CHAIN_ID_OPT.def('The chain ID.'),
    BASE_DIR.def(
      'The base directory where the node, client and wallet configuration and state are stored. ' +
        'The argument takes precedence over the environment variable.',
    ),
    WASM_DIR.def(
      'Directory with built WASM validity predicates and transactions. ' +
        'The argument takes precedence over the environment variable.',
    ),
    MODE.def('The mode in which to run the node: validator (default), full or seed.'),
  ];
}

export const globalArgs = {
  /** Declares the global options on `cmd`, skipping any key the command declares itself. */
  def(cmd: Command): Command {
    for (const option of globalOptions()) {
      if (!cmd.options.some((existing) => existing.name() === option.name())) {
        cmd.addOption(option);
      }
    }
    return cmd;
  },

  /** Reads the whole matched path; a value given deeper in the path wins. */
  parse(matches: ArgMatches): GlobalArgs {
    const flat = matches.flatten();
    return {
      chainId: CHAIN_ID_OPT.parse(flat),
      baseDir: BASE_DIR.parse(flat),
      wasmDir: WASM_DIR.parse(flat),
      mode: MODE.parse(flat),
    };
  },
};
