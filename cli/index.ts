#!/usr/bin/env node
/**
 * IPKCP Client CLI
 */

import { CommanderError } from 'commander';
import { createProgram } from './program.js';

const program = createProgram({
  input: process.stdin,
  output: process.stdout,
  errors: process.stderr,
  exit: (code) => process.exit(code)
});

try {
  await program.parseAsync();
} catch (error) {
  // Parse errors and --help/--version, already printed by commander
  if (error instanceof CommanderError) {
    process.exit(error.exitCode);
  }
  throw error;
}
