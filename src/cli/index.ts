#!/usr/bin/env node
import { hideBin } from 'yargs/helpers';
import { buildCli } from './program';

buildCli(hideBin(process.argv)).parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
