#!/usr/bin/env node
import { walletCli } from '../apps.js';
import { describeContext, runMain } from './main.js';

await runMain(async () => {
  const { command, token, ctx } = await walletCli();
  return { token, command, context: describeContext(ctx) };
});
