#!/usr/bin/env node
import { runAddressCli } from './lib/address_cli/cli.js';

runAddressCli().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
