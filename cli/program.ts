/**
 * Command definition
 *
 * `-h` is the host, so help is `--help` only.
 */

import { Command } from 'commander';
import { connect } from './commands/connect.js';
import type { CommandIO } from './commands/connect.js';
import { resolveOptions } from './options.js';
import type { ClientOptions, RawOptions } from './options.js';
import { CommandError, USAGE } from './errors.js';
import { OutputFormatter } from './formatter.js';

export const VERSION = '0.1.0';

export interface ProgramIO extends CommandIO {
  exit(code: number): void;
}

export function createProgram(io: ProgramIO): Command {
  const program = new Command();
  const formatter = new OutputFormatter(io.errors);

  program
    .name('ipkcpc')
    .description('IPKCP client - relay calculator requests to a server over TCP or UDP')
    .version(VERSION, '-v, --version')
    .helpOption('--help', 'Display help')
    .option('-h, --host <host>', 'Server host (IPv4, IPv6 or name)')
    .option('-p, --port <port>', 'Server port')
    .option('-m, --mode <mode>', 'Transport mode: tcp or udp')
    .option('-t, --timeout <ms>', 'UDP receive timeout in milliseconds, 0 waits forever')
    .option('--verbose', 'Trace session state changes to stderr')
    .configureOutput({
      writeOut: (str) => io.output.write(str),
      writeErr: (str) => io.errors.write(str)
    })
    .showHelpAfterError(USAGE)
    .exitOverride()
    .action(async () => {
      let options: ClientOptions;
      try {
        options = resolveOptions(program.opts<RawOptions>());
      } catch (error) {
        if (error instanceof CommandError) {
          formatter.error(error.format());
          formatter.usage();
          io.exit(1);
          return;
        }
        throw error;
      }

      io.exit(await connect(options, io));
    });

  return program;
}
