/**
 * Tracks command implementation
 */

import { Command } from 'commander';
import type { LiveGateway } from '@live-osc/client';
import { defaultContext, type CliContext } from '../context.js';
import { formatTracks, type TrackSummary } from '../formatting.js';
import { addConnectionOptions } from '../options.js';
import { withGateway } from '../session.js';
import type { ConnectionOptions } from '../validation.js';

async function summarizeTrack(gateway: LiveGateway, index: number): Promise<TrackSummary> {
  const [name, volume, pan, mute, solo] = await Promise.all([
    gateway.getTrackName(index),
    gateway.getTrackVolume(index),
    gateway.getTrackPanning(index),
    gateway.getTrackMute(index),
    gateway.getTrackSolo(index),
  ]);
  return { index, name, volume, pan, mute, solo };
}

/**
 * Create the tracks command
 */
export function createTracksCommand(ctx: CliContext = defaultContext): Command {
  const cmd = new Command('tracks');

  addConnectionOptions(cmd)
    .description('List tracks with mixer state')
    .action(async (options: ConnectionOptions) =>
      withGateway(ctx, options, () => async (gateway) => {
        const count = await gateway.getNumTracks();
        const indices = Array.from({ length: count }, (_, index) => index);
        const tracks = await Promise.all(indices.map((index) => summarizeTrack(gateway, index)));

        for (const line of formatTracks(tracks)) {
          ctx.out(line);
        }
      })
    );

  return cmd;
}
