import { Command } from 'commander';
import { globalArgs } from '../args/global.js';
import type { Cmd } from './command.js';

/** One executable: its name, help text and top-level command set. */
export interface App<T> {
  name: string;
  about: string;
  version: string;
  commands: Cmd<T>;
}

/** Builds a fresh commander tree with the global options declared at every level. */
export function buildApp<T>(app: App<T>): Command {
  const root = new Command(app.name).description(app.about).version(app.version);
  globalArgs.def(root);
  app.commands.addSub(root);
  inheritGlobals(root);
  return root;
}

function inheritGlobals(cmd: Command): void {
  for (const child of cmd.commands) {
    globalArgs.def(child);
    inheritGlobals(child);
  }
}
