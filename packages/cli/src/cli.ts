#!/usr/bin/env node
/**
 * CLI entry point
 *
 * Usage:
 *   histrack --config ./histrack.json
 */

import { runCli } from './command.js';

async function main(): Promise<void> {
  const controller = new AbortController();
  // a second Ctrl-C falls through to the default handler
  process.once('SIGINT', () => controller.abort(new Error('interrupted (SIGINT)')));

  process.exitCode = await runCli(process.argv.slice(2), {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    signal: controller.signal,
  });
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
