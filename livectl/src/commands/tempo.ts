/**
 * Tempo command implementation
 */

import { Command } from 'commander';
import { defaultContext, type CliContext } from '../context.js';
import { formatTempo } from '../formatting.js';
import { addConnectionOptions } from '../options.js';
import { withGateway } from '../session.js';
import { parseTempo, type ConnectionOptions } from '../validation.js';

/**
 * Create the tempo command
 * Without an argument it prints the tempo; with one it sets it
 */
export function createTempoCommand(ctx: CliContext = defaultContext): Command {
  const cmd = new Command('tempo');

  addConnectionOptions(cmd)
    .description('Get or set the song tempo')
    .argument('[bpm]', 'New tempo in BPM')
    .action(async (bpmArg: string | undefined, options: ConnectionOptions) =>
      withGateway(ctx, options, () => {
        const bpm = bpmArg === undefined ? undefined : parseTempo(bpmArg);

        return async (gateway) => {
          if (bpm === undefined) {
            ctx.out(formatTempo(await gateway.getTempo()));
            return;
          }

          await gateway.setTempo(bpm);
          // Read back so the output reflects what Live applied
          ctx.out(`Tempo set to ${formatTempo(await gateway.getTempo())}`);
        };
      })
    );

  return cmd;
}
