/**
 * Diagnostic output
 * Responses go to stdout untouched; everything else goes to stderr
 */

import chalk from 'chalk';
import type { OutputSink } from '../src/interactive-loop.js';
import type { SessionState } from '../src/types.js';
import { USAGE } from './errors.js';

export class OutputFormatter {
  constructor(private readonly errors: OutputSink) {}

  /**
   * `!ERR! <message>`
   */
  error(message: string): void {
    this.errors.write(`${chalk.red('!ERR!')} ${message}\n`);
  }

  usage(): void {
    this.errors.write(`${USAGE}\n`);
  }

  /**
   * Verbose-mode trace of a session transition
   */
  transition(from: SessionState, to: SessionState): void {
    this.errors.write(`${chalk.gray(`[session] ${from} -> ${to}`)}\n`);
  }
}
