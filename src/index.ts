#!/usr/bin/env node
// Load environment variables first
import 'dotenv/config';

import { createColors } from 'colorette';
import { runCli } from './cli/runCli.js';

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2), {
    env: process.env,
    stdout: process.stdout,
    stderr: process.stderr,
    colors: createColors(),
  });
}

main().catch((error) => {
  console.error('Unhandled error:', error);
  process.exit(1);
});
