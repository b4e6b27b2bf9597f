#!/usr/bin/env node
/**
 * depgate CLI Entry Point
 */

import { createProgram, exitCodeForError } from '../program.js';

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    process.exitCode = exitCodeForError(error);
  }
}

// Run the CLI
void main();
