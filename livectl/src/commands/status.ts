/**
 * Status command implementation
 */

import { Command } from 'commander';
import { defaultContext, type CliContext } from '../context.js';
import { formatStatus } from '../formatting.js';
import { addConnectionOptions } from '../options.js';
import { withGateway } from '../session.js';
import type { ConnectionOptions } from '../validation.js';

/**
 * Create the status command
 */
export function createStatusCommand(ctx: CliContext = defaultContext): Command {
  const cmd = new Command('status');

  addConnectionOptions(cmd)
    .description('Show tempo, time signature, transport state and set size')
    .action(async (options: ConnectionOptions) =>
      withGateway(ctx, options, () => async (gateway) => {
        const [tempo, timeSignature, isPlaying, numTracks, numScenes] = await Promise.all([
          gateway.getTempo(),
          gateway.getTimeSignature(),
          gateway.getIsPlaying(),
          gateway.getNumTracks(),
          gateway.getNumScenes(),
        ]);

        for (const line of formatStatus({ tempo, timeSignature, isPlaying, numTracks, numScenes })) {
          ctx.out(line);
        }
      })
    );

  return cmd;
}
