#!/usr/bin/env node

/**
 * livectl - Main entry point
 */

import { createProgram } from './program.js';

/**
 * Main CLI program
 */
async function main(): Promise<void> {
  const program = createProgram();

  // Show help if no command provided
  if (process.argv.slice(2).length === 0) {
    program.outputHelp();
    return;
  }

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(3);
});
