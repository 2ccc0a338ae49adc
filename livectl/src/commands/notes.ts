/**
 * Notes command implementation
 */

import { Command } from 'commander';
import { defaultContext, type CliContext } from '../context.js';
import { formatNotes } from '../formatting.js';
import { addConnectionOptions } from '../options.js';
import { withGateway } from '../session.js';
import { parseIndex, type ConnectionOptions } from '../validation.js';

/**
 * Create the notes command
 */
export function createNotesCommand(ctx: CliContext = defaultContext): Command {
  const cmd = new Command('notes');

  addConnectionOptions(cmd)
    .description('List the MIDI notes of a clip')
    .argument('<track>', 'Track index')
    .argument('<clip>', 'Clip slot index')
    .action(async (trackArg: string, clipArg: string, options: ConnectionOptions) =>
      withGateway(ctx, options, () => {
        const track = parseIndex('track', trackArg);
        const clip = parseIndex('clip', clipArg);

        return async (gateway) => {
          for (const line of formatNotes(await gateway.getClipNotes(track, clip))) {
            ctx.out(line);
          }
        };
      })
    );

  return cmd;
}
