#!/usr/bin/env node
import 'dotenv/config';
import { buildCli, exitCodeFor } from './cli/commands.js';
import { errorMessage } from './control-plane/errors.js';

const program = buildCli();
program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`hires-relay: ${errorMessage(err)}`);
  process.exit(exitCodeFor(err));
});
