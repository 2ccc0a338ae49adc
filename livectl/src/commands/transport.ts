/**
 * Play and stop command implementations
 */

import { Command } from 'commander';
import { defaultContext, type CliContext } from '../context.js';
import { addConnectionOptions } from '../options.js';
import { withGateway } from '../session.js';
import type { ConnectionOptions } from '../validation.js';

export function createPlayCommand(ctx: CliContext = defaultContext): Command {
  const cmd = new Command('play');

  addConnectionOptions(cmd)
    .description('Start song playback')
    .action(async (options: ConnectionOptions) =>
      withGateway(ctx, options, () => async (gateway) => {
        await gateway.startPlaying();
        ctx.out('OK');
      })
    );

  return cmd;
}

export function createStopCommand(ctx: CliContext = defaultContext): Command {
  const cmd = new Command('stop');

  addConnectionOptions(cmd)
    .description('Stop song playback')
    .action(async (options: ConnectionOptions) =>
      withGateway(ctx, options, () => async (gateway) => {
        await gateway.stopPlaying();
        ctx.out('OK');
      })
    );

  return cmd;
}
