#!/usr/bin/env node
import { nodeCli } from '../apps.js';
import { describeContext, runMain } from './main.js';

await runMain(async () => {
  const { command, token, ctx } = await nodeCli();
  return { token, command, context: describeContext(ctx) };
});
