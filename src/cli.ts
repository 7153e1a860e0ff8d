import { Command } from 'commander';
import { createPrintCommand } from './commands/print/index.js';
import type { LineSink } from './sequence/index.js';

export function createProgram(sink: LineSink = process.stdout): Command {
  const program = new Command();

  program
    .name('seqprint')
    .description('Print the integers 0, 1 and 2, one per line')
    .version('0.1.0');

  program.addCommand(createPrintCommand(sink), { isDefault: true });

  return program;
}
