import { Command } from 'commander';
import { withErrorHandler } from '../../lib/command/with-error-handler.js';
import { debug } from '../../lib/utils/debug.js';
import { runSequence, type LineSink } from '../../sequence/index.js';

export function createPrintCommand(sink: LineSink = process.stdout): Command {
  return new Command('print')
    .description('Print the integer sequence, one value per line')
    .action(
      withErrorHandler(async () => {
        const sequence = runSequence(sink);
        debug('cli', `printed [${sequence.join(', ')}]`);

        // Exit naturally so pending stdout writes drain
        process.exitCode = 0;
      }),
    );
}
