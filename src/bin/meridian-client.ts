#!/usr/bin/env node
import { clientCli } from '../apps.js';
import { describeContext, runMain } from './main.js';

await runMain(async () => {
  const invocation = await clientCli();
  if (invocation.context === 'with') {
    const { command, token, ctx } = invocation;
    return { token, command, context: describeContext(ctx) };
  }
  const { command, token, global } = invocation;
  return { token, command, global };
});
