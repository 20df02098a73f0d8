#!/usr/bin/env node
import { combinedCli } from '../apps.js';
import { runMain } from './main.js';

await runMain(async () => {
  const { command, token } = combinedCli();
  return { token, command };
});
